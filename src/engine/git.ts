import {execa} from 'execa'

/**
 * Short commit id of the checkout at `cwd`, with a `-dirty` suffix when the
 * working tree has uncommitted changes. Undefined outside a git checkout or
 * without git installed.
 */
export async function gitRevision(cwd: string): Promise<string | undefined> {
  const head = await execa('git', ['rev-parse', '--short', 'HEAD'], {cwd, reject: false})
  if (head.failed || head.stdout.trim() === '') {
    return undefined
  }

  const status = await execa('git', ['status', '--porcelain'], {cwd, reject: false})
  const dirty = !status.failed && status.stdout.trim() !== ''
  return dirty ? `${head.stdout.trim()}-dirty` : head.stdout.trim()
}
