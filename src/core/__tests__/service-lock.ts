import process from 'node:process'
import {access, readFile, readdir} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ServiceNameCollisionError} from '../../errors.js'
import {createTmpDir, writeFixture} from '../../__tests__/helpers.js'
import {ServiceLock, locksDir} from '../service-lock.js'

const info = {serviceId: 'db', runId: 'run-1'}

test('acquire writes a lock owned by this process', async t => {
  const root = await createTmpDir()
  const lock = await ServiceLock.acquire(root, 'app-db', info)

  const content = await readFile(join(locksDir(root), 'app-db.json'), 'utf8')
  t.like(JSON.parse(content), {pid: process.pid, serviceId: 'db', runId: 'run-1', version: 1})
  t.is(lock.info.serviceId, 'db')
  await lock.release()
})

test('a second acquire while held collides', async t => {
  const root = await createTmpDir()
  const lock = await ServiceLock.acquire(root, 'app-db', info)

  const error = await t.throwsAsync(ServiceLock.acquire(root, 'app-db', {serviceId: 'db', runId: 'run-2'}), {instanceOf: ServiceNameCollisionError})
  t.is(error?.ownerPid, process.pid)
  t.is(error?.containerName, 'app-db')
  await lock.release()
})

test('release frees the name and is idempotent', async t => {
  const root = await createTmpDir()
  const lock = await ServiceLock.acquire(root, 'app-db', info)
  await lock.release()
  await lock.release()

  await t.throwsAsync(access(join(locksDir(root), 'app-db.json')))
  const again = await ServiceLock.acquire(root, 'app-db', info)
  await again.release()
})

test('a lock left by a dead process is cleared', async t => {
  const root = await createTmpDir()
  await writeFixture(root, '.rigger/locks/app-db.json', JSON.stringify({pid: 99_999_999, runId: 'old', serviceId: 'db', startedAt: '2020-01-01T00:00:00.000Z', version: 1}))

  t.is(await ServiceLock.check(root, 'app-db'), undefined)
  const lock = await ServiceLock.acquire(root, 'app-db', info)
  t.is(lock.info.pid, process.pid)
  await lock.release()
})

test('a malformed lock is cleared', async t => {
  const root = await createTmpDir()
  await writeFixture(root, '.rigger/locks/app-db.json', '{not json')

  t.is(await ServiceLock.check(root, 'app-db'), undefined)
  await t.throwsAsync(access(join(locksDir(root), 'app-db.json')))
})

test('locks of different containers are independent', async t => {
  const root = await createTmpDir()
  const first = await ServiceLock.acquire(root, 'app-db', info)
  const second = await ServiceLock.acquire(root, 'app-cache', {serviceId: 'cache', runId: 'run-1'})
  await first.release()
  await second.release()
  t.pass()
})

test('concurrent acquires of one name: exactly one wins', async t => {
  const root = await createTmpDir()
  const attempts = await Promise.allSettled([
    ServiceLock.acquire(root, 'app-db', {serviceId: 'db', runId: 'run-1'}),
    ServiceLock.acquire(root, 'app-db', {serviceId: 'db', runId: 'run-2'}),
    ServiceLock.acquire(root, 'app-db', {serviceId: 'db', runId: 'run-3'})
  ])

  const won = attempts.flatMap(a => a.status === 'fulfilled' ? [a.value] : [])
  const lost = attempts.flatMap(a => a.status === 'rejected' ? [a.reason] : [])
  t.is(won.length, 1)
  t.is(lost.length, 2)
  t.true(lost.every(reason => reason instanceof ServiceNameCollisionError))

  const content = await readFile(join(locksDir(root), 'app-db.json'), 'utf8')
  t.like(JSON.parse(content), {runId: won[0]?.info.runId})
  t.deepEqual(await readdir(locksDir(root)), ['app-db.json'])
  await won[0]?.release()
})
