import { Token } from "./token.js";
import { Position } from "./types.js";

/** A line or block comment, text kept verbatim */
export interface Comment {
  type: "comment";
  token: Token;
  text: string;
}

/** An ordered statement list: a document or a block body */
export interface Root {
  type: "root";
  statements: Statement[];
  /** Comments after the last statement of a block body */
  danglingComments: Comment[];
}

interface StatementBase {
  token: Token;
  leadingComments: Comment[];
  /** Comment on the same line as the statement's last token */
  lineComment?: Comment;
}

/** `name = value` */
export interface AssignStatement extends StatementBase {
  type: "assign";
  name: Identifier;
  value: Expression;
}

/** `name "label" { ... }`, label optional */
export interface BlockStatement extends StatementBase {
  type: "block";
  name: Identifier;
  label?: StringLiteral;
  body: Root;
}

/** `var name = value` */
export interface VarStatement extends StatementBase {
  type: "var";
  name: Identifier;
  value: Expression;
}

/** `import "path"` */
export interface ImportStatement extends StatementBase {
  type: "import";
  path: StringLiteral;
}

export type Statement = AssignStatement | BlockStatement | VarStatement | ImportStatement;

export interface Identifier {
  type: "identifier";
  token: Token;
  value: string;
}

export interface StringLiteral {
  type: "string";
  token: Token;
  value: string;
}

export interface IntegerLiteral {
  type: "integer";
  token: Token;
  value: number;
}

export interface FloatLiteral {
  type: "float";
  token: Token;
  value: number;
}

export interface BoolLiteral {
  type: "bool";
  token: Token;
  value: boolean;
}

export interface DurationLiteral {
  type: "duration";
  token: Token;
  /** Source text such as `1.5s`; parsed when decoded */
  value: string;
}

export interface ListLiteral {
  type: "list";
  token: Token;
  elements: Expression[];
  hasTrailingComma: boolean;
}

/** `{[ key = value, ... ]}` */
export interface MapLiteral {
  type: "map";
  token: Token;
  elements: Statement[];
  danglingComments: Comment[];
}

/** Anonymous `{ ... }` used as a value */
export interface BlockLiteral {
  type: "blockLiteral";
  token: Token;
  body: Root;
}

/** `${name}` */
export interface VarRef {
  type: "varRef";
  token: Token;
  name: string;
}

/** `env("NAME")` or `env("NAME", "default")` */
export interface EnvExpression {
  type: "env";
  token: Token;
  name: StringLiteral;
  defaultValue?: StringLiteral;
}

export type Expression =
  | Identifier
  | StringLiteral
  | IntegerLiteral
  | FloatLiteral
  | BoolLiteral
  | DurationLiteral
  | ListLiteral
  | MapLiteral
  | BlockLiteral
  | VarRef
  | EnvExpression;

export type Node = Root | Statement | Expression | Comment;

/** Literal of the token a node was built from */
export function tokenLiteral(node: Node): string {
  if (node.type === "root") {
    return node.statements.length > 0 ? node.statements[0].token.literal : "";
  }
  return node.token.literal;
}

export function positionOf(node: Statement | Expression | Comment): Position {
  return { line: node.token.line, column: node.token.column };
}
