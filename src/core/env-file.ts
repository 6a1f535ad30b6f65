import {readFile} from 'node:fs/promises'
import {parse} from 'dotenv'
import {ValidationError} from '../errors.js'

/**
 * Reads dotenv files in order; later files override earlier ones.
 * A file that cannot be read is a configuration error.
 */
export async function loadEnvFiles(filePaths: string[]): Promise<Record<string, string>> {
  const env: Record<string, string> = {}

  for (const filePath of filePaths) {
    let content: string
    try {
      // eslint-disable-next-line no-await-in-loop
      content = await readFile(filePath, 'utf8')
    } catch (error) {
      throw new ValidationError(`Cannot read env file ${filePath}`, {cause: error})
    }

    Object.assign(env, parse(content))
  }

  return env
}
