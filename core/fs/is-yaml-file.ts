import { extname } from 'node:path'

/**
 * Checks if a path names a YAML file, ignoring extension case.
 *
 * @param filePath - The path to the file.
 * @returns True for `.yml` and `.yaml` files.
 */
export function isYamlFile(filePath: string): boolean {
  let extension = extname(filePath).toLowerCase()
  return extension === '.yml' || extension === '.yaml'
}
