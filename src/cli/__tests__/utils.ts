import test from 'ava'
import {Command, CommanderError, InvalidArgumentError} from 'commander'
import {collect, getGlobalOptions, positiveInteger, positiveNumber, type GlobalOptions} from '../utils.js'

async function parseGlobals(argv: string[]): Promise<GlobalOptions | undefined> {
  let seen: GlobalOptions | undefined
  const program = new Command()
    .option('-p, --project <path>', 'Project file or directory', '.')
    .option('--json', 'Output structured JSON logs')
    .option('--env-file <path>', 'Dotenv file', collect, [])

  program
    .command('list')
    .action((_options: Record<string, unknown>, cmd: Command) => {
      seen = getGlobalOptions(cmd)
    })

  await program.parseAsync(argv, {from: 'user'})
  return seen
}

test('collect appends repeated values', t => {
  t.deepEqual(collect('b', ['a']), ['a', 'b'])
})

test('global options reach subcommands', async t => {
  const options = await parseGlobals(['--project', 'web/rigger.yaml', '--env-file', '.env', '--env-file', '.env.ci', '--json', 'list'])
  t.deepEqual(options, {project: 'web/rigger.yaml', envFile: ['.env', '.env.ci'], json: true})
})

test('global options default', async t => {
  const options = await parseGlobals(['list'])
  t.deepEqual(options, {project: '.', envFile: []})
})

test('positiveInteger accepts counts and rejects anything else', t => {
  t.is(positiveInteger('4'), 4)
  for (const value of ['abc', '0', '-2', '1.5', '']) {
    t.throws(() => positiveInteger(value), {instanceOf: InvalidArgumentError}, value)
  }
})

test('positiveNumber accepts fractional seconds and rejects anything else', t => {
  t.is(positiveNumber('0.5'), 0.5)
  for (const value of ['abc', '0', '-1', 'Infinity']) {
    t.throws(() => positiveNumber(value), {instanceOf: InvalidArgumentError}, value)
  }
})

test('an invalid --concurrency stops the command before its action', async t => {
  let ran = false
  const program = new Command()
    .exitOverride()
    .configureOutput({writeErr() {/* silent */}})
  program
    .command('build')
    .option('-c, --concurrency <number>', 'Max targets at once', positiveInteger)
    .action(() => {
      ran = true
    })

  const error = await t.throwsAsync(program.parseAsync(['build', '-c', 'abc'], {from: 'user'}), {instanceOf: CommanderError})
  t.is(error?.code, 'commander.invalidArgument')
  t.false(ran)
})
