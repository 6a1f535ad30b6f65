import test from 'ava'
import {ConsumerFailureError, PipelineTimeoutError, ReadinessTimeoutError, RuntimeNotAvailableError, ServiceNameCollisionError, ServiceStartError} from '../../errors.js'
import type {ServiceSpec} from '../../types.js'
import {FakeContainerRuntime, createTmpDir, recordingReporter, testContext, writeFixture} from '../../__tests__/helpers.js'
import {deadlineSignal} from '../context.js'
import {ServiceLifecycle} from '../service-lifecycle.js'
import {ServiceLock} from '../service-lock.js'

function service(id: string, overrides: Partial<ServiceSpec['readiness']> = {}): ServiceSpec {
  return {
    id,
    image: `${id}:latest`,
    env: {POSTGRES_PASSWORD: 'test-secret'},
    ports: ['5432:5432'],
    readiness: {cmd: ['pg_isready'], intervalMs: 1, timeoutMs: 5000, ...overrides}
  }
}

test('starts in order, runs the consumer once, tears down in reverse', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime()
  const lifecycle = new ServiceLifecycle(runtime, 'proj')
  let consumed = 0

  const value = await lifecycle.withServices([service('db'), service('cache')], async () => {
    consumed++
    return 'done'
  }, testContext(root))

  t.is(value, 'done')
  t.is(consumed, 1)
  t.deepEqual(runtime.calls, [
    'check',
    'start:proj-db',
    'probe:proj-db',
    'start:proj-cache',
    'probe:proj-cache',
    'stop:proj-cache',
    'stop:proj-db'
  ])
})

test('labels and settings reach the runtime', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime()
  const ctx = testContext(root)

  await new ServiceLifecycle(runtime, 'proj').withServices([service('db')], async () => undefined, ctx)
  t.deepEqual(runtime.started[0], {
    name: 'proj-db',
    image: 'db:latest',
    env: {POSTGRES_PASSWORD: 'test-secret'},
    ports: ['5432:5432'],
    args: undefined,
    labels: {'rigger.project': 'proj', 'rigger.service': 'db', 'rigger.run': ctx.runId}
  })
})

test('reports service states in lifecycle order', async t => {
  const root = await createTmpDir()
  const {reporter, events} = recordingReporter()

  await new ServiceLifecycle(new FakeContainerRuntime(), 'proj').withServices([service('db')], async () => undefined, testContext(root, {reporter}))
  const states = events.flatMap(e => e.event === 'SERVICE_STATE' ? [e.state] : [])
  t.deepEqual(states, ['STARTING', 'READY', 'TEARING_DOWN', 'STOPPED'])
})

test('polls until ready', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime({probe: (_name, attempt) => attempt === 3})

  await new ServiceLifecycle(runtime, 'proj').withServices([service('db', {maxAttempts: 5})], async () => undefined, testContext(root))
  t.is(runtime.calls.filter(c => c === 'probe:proj-db').length, 3)
})

test('a slow readiness check is cut off at the readiness timeout', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime({hangingProbes: true})
  const spec = service('db', {intervalMs: 100, timeoutMs: 350, attemptTimeoutMs: 200})

  const error = await t.throwsAsync(new ServiceLifecycle(runtime, 'proj').withServices([spec], async () => 'never', testContext(root)), {instanceOf: ReadinessTimeoutError})

  // 200ms probe, 100ms sleep, then only what is left of the 350ms budget
  t.is(runtime.probes[0]?.timeoutMs, 200)
  t.true(runtime.probes.slice(1).every(p => p.timeoutMs <= 50))
  t.true((error?.elapsedMs ?? Infinity) < 450)
})

test('readiness timeout tears the service down exactly once and skips the consumer', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime({probe: () => false})
  const {reporter, events} = recordingReporter()
  let consumed = false

  await t.throwsAsync(new ServiceLifecycle(runtime, 'proj').withServices([service('db', {maxAttempts: 2}), service('cache')], async () => {
    consumed = true
  }, testContext(root, {reporter})), {instanceOf: ReadinessTimeoutError})

  t.false(consumed)
  t.deepEqual(runtime.calls, ['check', 'start:proj-db', 'probe:proj-db', 'probe:proj-db', 'stop:proj-db'])
  const states = events.flatMap(e => e.event === 'SERVICE_STATE' ? [e.state] : [])
  t.deepEqual(states, ['STARTING', 'FAILED_TO_START', 'TEARING_DOWN', 'STOPPED'])
})

test('a service that fails to start is still removed, along with the ones before it', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime({failStart: ['proj-cache']})

  const error = await t.throwsAsync(new ServiceLifecycle(runtime, 'proj').withServices([service('db'), service('cache')], async () => undefined, testContext(root)), {instanceOf: ServiceStartError})
  t.is(error?.serviceId, 'cache')
  t.deepEqual(runtime.calls, ['check', 'start:proj-db', 'probe:proj-db', 'start:proj-cache', 'stop:proj-cache', 'stop:proj-db'])
})

test('consumer failure wins over a teardown failure', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime({failStop: ['proj-db']})
  const {reporter, events} = recordingReporter()

  await t.throwsAsync(new ServiceLifecycle(runtime, 'proj').withServices([service('db')], async () => {
    throw new ConsumerFailureError('unit', 1)
  }, testContext(root, {reporter})), {instanceOf: ConsumerFailureError})

  const failures = events.flatMap(e => e.event === 'SERVICE_TEARDOWN_FAILED' ? [e.message] : [])
  t.deepEqual(failures, ['Failed to tear down service db: cannot remove proj-db'])
})

test('a teardown failure alone does not fail the run', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime({failStop: ['proj-db']})

  const value = await new ServiceLifecycle(runtime, 'proj').withServices([service('db')], async () => 42, testContext(root))
  t.is(value, 42)
})

test('the deadline tears services down while the consumer is still running', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime()

  await t.throwsAsync(new ServiceLifecycle(runtime, 'proj').withServices(
    [service('db')],
    async () => new Promise<never>(() => {/* never settles */}),
    testContext(root, {signal: deadlineSignal(20)})
  ), {instanceOf: PipelineTimeoutError})

  t.deepEqual(runtime.calls, ['check', 'start:proj-db', 'probe:proj-db', 'stop:proj-db'])
})

test('a container name held by a live run collides and nothing starts', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime()
  const held = await ServiceLock.acquire(root, 'proj-db', {serviceId: 'db', runId: 'other'})

  await t.throwsAsync(new ServiceLifecycle(runtime, 'proj').withServices([service('db')], async () => undefined, testContext(root)), {instanceOf: ServiceNameCollisionError})
  t.deepEqual(runtime.calls, ['check'])
  await held.release()
})

test('locks are released after teardown', async t => {
  const root = await createTmpDir()
  await new ServiceLifecycle(new FakeContainerRuntime(), 'proj').withServices([service('db')], async () => undefined, testContext(root))
  t.is(await ServiceLock.check(root, 'proj-db'), undefined)
})

test('a stale lock from a crashed run does not block provisioning', async t => {
  const root = await createTmpDir()
  await writeFixture(root, '.rigger/locks/proj-db.json', JSON.stringify({pid: 99_999_999, runId: 'old', serviceId: 'db', startedAt: '2020-01-01T00:00:00.000Z', version: 1}))
  const runtime = new FakeContainerRuntime()

  await new ServiceLifecycle(runtime, 'proj').withServices([service('db')], async () => undefined, testContext(root))
  t.deepEqual(runtime.calls, ['check', 'start:proj-db', 'probe:proj-db', 'stop:proj-db'])
})

test('an unavailable runtime fails before anything starts', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime({failCheck: true})

  await t.throwsAsync(new ServiceLifecycle(runtime, 'proj').withServices([service('db')], async () => undefined, testContext(root)), {instanceOf: RuntimeNotAvailableError})
  t.deepEqual(runtime.calls, ['check'])
})

test('no services: the consumer runs without touching the runtime', async t => {
  const root = await createTmpDir()
  const runtime = new FakeContainerRuntime()

  t.is(await new ServiceLifecycle(runtime, 'proj').withServices([], async () => 'ok', testContext(root)), 'ok')
  t.deepEqual(runtime.calls, [])
})
