import type { ExpressionNode } from './expression-node'

import { parseExpression } from './parse-expression'

/**
 * Lists the matrix keys a template reads through `matrix.<key>` or
 * `matrix['<key>']`.
 *
 * @param template - Text with embedded expressions.
 * @returns Referenced keys in order of appearance, without duplicates.
 * @throws {ConditionEvaluationError} When an embedded expression is malformed.
 */
export function collectMatrixReferences(template: string): string[] {
  let sources = [...template.matchAll(/\$\{\{(?<expression>.*?)\}\}/gsu)].map(
    match => match.groups?.['expression'] ?? '',
  )

  let keys = new Set<string>()

  function walk(node: ExpressionNode): void {
    switch (node.type) {
      case 'index':
        if (
          node.object.type === 'context' &&
          node.object.name === 'matrix' &&
          node.key.type === 'literal' &&
          typeof node.key.value === 'string'
        ) {
          keys.add(node.key.value)
        }
        walk(node.object)
        walk(node.key)
        break
      case 'comparison':
      case 'logical':
        walk(node.left)
        walk(node.right)
        break
      case 'call':
        for (let argument of node.arguments) {
          walk(argument)
        }
        break
      case 'not':
        walk(node.operand)
        break
      case 'literal':
      case 'context':
        break
    }
  }

  for (let source of sources) {
    walk(parseExpression(source.trim()))
  }

  return [...keys]
}
