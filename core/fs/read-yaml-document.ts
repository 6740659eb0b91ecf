import type { Document } from 'yaml'

import { readFile } from 'node:fs/promises'
import { parseDocument } from 'yaml'

/**
 * Reads a YAML file into a Document.
 *
 * Parse errors do not throw; they are collected in `document.errors` so the
 * caller can report them with the file path.
 *
 * @param filePath - Path to the YAML file.
 * @returns Parsed YAML document.
 */
export async function readYamlDocument(filePath: string): Promise<Document> {
  let content = await readFile(filePath, 'utf8')
  return parseDocument(content, { prettyErrors: true, uniqueKeys: true })
}
