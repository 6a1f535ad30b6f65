import {mkdir} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {MissingInputError} from '../../errors.js'
import type {Target} from '../../types.js'
import {createTmpDir, writeFixture} from '../../__tests__/helpers.js'
import {evaluateTarget, modifiedAt, type Staleness} from '../staleness.js'

function target(overrides: Partial<Target> = {}): Target {
  return {id: 't', inputs: [{kind: 'file', path: 'src/in.txt'}], outputs: ['dist/out.txt'], cmd: ['make'], ...overrides}
}

async function evaluate(root: string, subject: Target, options: {
  deps?: string[];
  upstream?: Map<string, Staleness>;
  others?: Target[];
} = {}): Promise<Staleness> {
  const all = [subject, ...options.others ?? []]
  const producedBy = new Map<string, string>()
  for (const t of all) {
    for (const output of t.outputs) {
      producedBy.set(output, t.id)
    }
  }

  return evaluateTarget({
    target: subject,
    root,
    deps: new Set(options.deps ?? []),
    upstream: options.upstream ?? new Map(),
    targets: new Map(all.map(t => [t.id, t])),
    producedBy
  })
}

test('modifiedAt: undefined for a missing path', async t => {
  const root = await createTmpDir()
  t.is(await modifiedAt(join(root, 'nope')), undefined)
  t.is(await modifiedAt(join(root, 'nope', 'deeper')), undefined)
})

test('missing output is stale', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 100)
  t.deepEqual(await evaluate(root, target()), {stale: true, reason: 'missing-output'})
})

test('output newer than every input is fresh', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 100)
  await writeFixture(root, 'dist/out.txt', 'y', 10)
  t.deepEqual(await evaluate(root, target()), {stale: false, reason: 'fresh'})
})

test('input newer than the output is outdated', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 10)
  await writeFixture(root, 'dist/out.txt', 'y', 100)
  t.deepEqual(await evaluate(root, target()), {stale: true, reason: 'outdated'})
})

test('the oldest output decides', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 50)
  await writeFixture(root, 'dist/out.txt', 'y', 10)
  await writeFixture(root, 'dist/old.txt', 'z', 100)
  t.deepEqual(await evaluate(root, target({outputs: ['dist/out.txt', 'dist/old.txt']})), {stale: true, reason: 'outdated'})
})

test('a directory input compares by its own mtime', async t => {
  const root = await createTmpDir()
  await mkdir(join(root, 'src'), {recursive: true})
  await writeFixture(root, 'dist/out.txt', 'y', -100)
  t.deepEqual(await evaluate(root, target({inputs: [{kind: 'file', path: 'src'}]})), {stale: false, reason: 'fresh'})
})

test('missing input that nothing produces fails', async t => {
  const root = await createTmpDir()
  const error = await t.throwsAsync(evaluate(root, target()), {instanceOf: MissingInputError})
  t.is(error?.path, 'src/in.txt')
  t.is(error?.targetId, 't')
})

test('alwaysStale wins over fresh outputs', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 100)
  await writeFixture(root, 'dist/out.txt', 'y', 10)
  t.deepEqual(await evaluate(root, target({alwaysStale: true})), {stale: true, reason: 'always'})
})

test('a stale upstream with outputs makes the target stale', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 100)
  await writeFixture(root, 'dist/out.txt', 'y', 10)
  const upstream = new Map<string, Staleness>([['dep', {stale: true, reason: 'missing-output'}]])
  const dep: Target = {id: 'dep', inputs: [], outputs: ['lib/dep.js'], cmd: ['make']}
  t.deepEqual(await evaluate(root, target(), {deps: ['dep'], upstream, others: [dep]}), {stale: true, reason: 'upstream'})
})

test('a stale upstream without outputs leaves the target fresh', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 100)
  await writeFixture(root, 'dist/out.txt', 'y', 10)
  const upstream = new Map<string, Staleness>([['install', {stale: true, reason: 'always'}]])
  const install: Target = {id: 'install', inputs: [], outputs: [], cmd: ['install'], alwaysStale: true}
  t.deepEqual(await evaluate(root, target(), {deps: ['install'], upstream, others: [install]}), {stale: false, reason: 'fresh'})
})

test('an upstream output newer than the target output is outdated', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'src/in.txt', 'x', 100)
  await writeFixture(root, 'dist/out.txt', 'y', 50)
  await writeFixture(root, 'lib/dep.js', 'z', 10)
  const dep: Target = {id: 'dep', inputs: [], outputs: ['lib/dep.js'], cmd: ['make']}
  const upstream = new Map<string, Staleness>([['dep', {stale: false, reason: 'fresh'}]])
  t.deepEqual(await evaluate(root, target(), {deps: ['dep'], upstream, others: [dep]}), {stale: true, reason: 'outdated'})
})

test('a produced input missing under a fresh producer is outdated', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'dist/out.txt', 'y', 10)
  const producer: Target = {id: 'gen', inputs: [], outputs: ['src/in.txt'], cmd: ['gen']}
  const upstream = new Map<string, Staleness>([['gen', {stale: false, reason: 'fresh'}]])
  t.deepEqual(await evaluate(root, target(), {deps: ['gen'], upstream, others: [producer]}), {stale: true, reason: 'outdated'})
})

test('no inputs and existing outputs is fresh', async t => {
  const root = await createTmpDir()
  await writeFixture(root, 'dist/out.txt', 'y', 10)
  t.deepEqual(await evaluate(root, target({inputs: []})), {stale: false, reason: 'fresh'})
})
