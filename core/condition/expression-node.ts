/** Literal value written in an expression. */
export type LiteralValue = boolean | string | number | null

/** Parsed expression tree. */
export type ExpressionNode =
  | {
      operator: '==' | '!=' | '<=' | '>=' | '<' | '>'
      left: ExpressionNode
      right: ExpressionNode
      type: 'comparison'
    }
  | {
      left: ExpressionNode
      right: ExpressionNode
      operator: '&&' | '||'
      type: 'logical'
    }
  | { object: ExpressionNode; key: ExpressionNode; type: 'index' }
  | { arguments: ExpressionNode[]; type: 'call'; name: string }
  | { operand: ExpressionNode; type: 'not' }
  | { value: LiteralValue; type: 'literal' }
  | { type: 'context'; name: string }
