/**
 * Shell AST Types
 *
 * Node definitions for POSIX sh / bash scripts. Produced by the parser,
 * read by the analyzer, cloned and rewritten by the rewriter, and rendered
 * by the code generator.
 *
 * Every node carries a `span` and a tree-unique `id`. The optional `layout`
 * field records formatting facts (blank lines, continuations) that are not
 * part of the structure.
 */

import type { NodeId } from "../core/node-id.ts";
import type { Span } from "../core/types.ts";
import type { Shell } from "./shell-dialect.ts";

// =============================================================================
// Base Types
// =============================================================================

export interface BaseNode {
  type: string;
  span: Span;
  id: NodeId;
}

export interface Layout {
  /** Blank source lines directly above this statement */
  blankLinesBefore?: number;
  /** Argument indexes preceded by a backslash-newline in the source */
  continuations?: number[];
  /** Written on the same line as the previous statement (trailing comments) */
  sameLine?: boolean;
}

// =============================================================================
// Top-level Program
// =============================================================================

export interface ProgramMetadata {
  /** File name or other identity of the source, when known */
  source?: string;
  /** From the shebang or a `# shell:` directive */
  dialect: Shell;
  lineCount: number;
  parseDurationMs: number;
}

export interface Program extends BaseNode {
  type: "Program";
  body: Statement[];
  metadata: ProgramMetadata;
}

// =============================================================================
// Statements
// =============================================================================

export type Statement =
  | Command
  | Pipeline
  | AndOrList
  | Background
  | IfStatement
  | WhileStatement
  | UntilStatement
  | ForStatement
  | CStyleForStatement
  | CaseStatement
  | SelectStatement
  | FunctionDeclaration
  | Group
  | NegatedCommand
  | Coproc
  | VariableAssignment
  | ReturnStatement
  | TestCommand
  | ArithmeticCommand
  | Comment;

/** Statements that own a body and may carry trailing redirections */
export type CompoundStatement =
  | IfStatement
  | WhileStatement
  | UntilStatement
  | ForStatement
  | CStyleForStatement
  | CaseStatement
  | SelectStatement
  | Group;

// =============================================================================
// Commands
// =============================================================================

export interface Command extends BaseNode {
  type: "Command";
  /** Null for a command made only of assignments and/or redirections */
  name: Word | null;
  args: Word[];
  redirects: Redirection[];
  /** Prefix assignments (`FOO=1 cmd`) */
  assignments: VariableAssignment[];
  layout?: Layout;
}

export type PipeOperator = "|" | "|&";

export interface Pipeline extends BaseNode {
  type: "Pipeline";
  commands: Statement[];
  /** operators[i] joins commands[i] and commands[i + 1] */
  operators: PipeOperator[];
  layout?: Layout;
}

export interface AndOrList extends BaseNode {
  type: "AndOrList";
  left: Statement;
  operator: "&&" | "||";
  right: Statement;
  layout?: Layout;
}

export interface Background extends BaseNode {
  type: "Background";
  command: Statement;
  layout?: Layout;
}

export interface NegatedCommand extends BaseNode {
  type: "NegatedCommand";
  command: Statement;
  layout?: Layout;
}

export interface Coproc extends BaseNode {
  type: "Coproc";
  name: string | null;
  body: Statement;
  layout?: Layout;
}

// =============================================================================
// Control Flow
// =============================================================================

export interface IfStatement extends BaseNode {
  type: "IfStatement";
  test: Statement[];
  consequent: Statement[];
  /** `elif` chains nest as an IfStatement with `elif: true` */
  alternate: Statement[] | IfStatement | null;
  elif: boolean;
  redirects: Redirection[];
  layout?: Layout;
}

export interface WhileStatement extends BaseNode {
  type: "WhileStatement";
  test: Statement[];
  body: Statement[];
  redirects: Redirection[];
  layout?: Layout;
}

export interface UntilStatement extends BaseNode {
  type: "UntilStatement";
  test: Statement[];
  body: Statement[];
  redirects: Redirection[];
  layout?: Layout;
}

export interface ForStatement extends BaseNode {
  type: "ForStatement";
  variable: string;
  /** Null when the `in` list is omitted (iterates "$@") */
  items: Word[] | null;
  body: Statement[];
  redirects: Redirection[];
  layout?: Layout;
}

/**
 * `for ((init; test; update))`. The clauses stay raw text: the arithmetic
 * dialect differs between shells.
 */
export interface CStyleForStatement extends BaseNode {
  type: "CStyleForStatement";
  init: string;
  test: string;
  update: string;
  body: Statement[];
  redirects: Redirection[];
  layout?: Layout;
}

export type CaseTerminator = ";;" | ";&" | ";;&";

export interface CaseStatement extends BaseNode {
  type: "CaseStatement";
  word: Word;
  clauses: CaseClause[];
  redirects: Redirection[];
  layout?: Layout;
}

export interface CaseClause extends BaseNode {
  type: "CaseClause";
  patterns: Word[];
  body: Statement[];
  terminator: CaseTerminator;
}

export interface SelectStatement extends BaseNode {
  type: "SelectStatement";
  variable: string;
  items: Word[] | null;
  body: Statement[];
  redirects: Redirection[];
  layout?: Layout;
}

export interface FunctionDeclaration extends BaseNode {
  type: "FunctionDeclaration";
  name: string;
  body: Statement;
  /** Declared with the `function` keyword */
  keyword: boolean;
  layout?: Layout;
}

/**
 * `{ ...; }` or `( ... )`; `subshell` tells them apart.
 */
export interface Group extends BaseNode {
  type: "Group";
  body: Statement[];
  subshell: boolean;
  redirects: Redirection[];
  layout?: Layout;
}

export interface ReturnStatement extends BaseNode {
  type: "ReturnStatement";
  keyword: "return" | "exit";
  code: Word | null;
  layout?: Layout;
}

export interface Comment extends BaseNode {
  type: "Comment";
  /** Text after the `#` */
  text: string;
  layout?: Layout;
}

// =============================================================================
// Assignments
// =============================================================================

export interface ArrayLiteral extends BaseNode {
  type: "ArrayLiteral";
  elements: Word[];
}

export interface VariableAssignment extends BaseNode {
  type: "VariableAssignment";
  name: string;
  /** Array subscript text for `name[index]=value` */
  index: string | null;
  value: Word | ArrayLiteral;
  /** `+=` rather than `=` */
  append: boolean;
  /** Written as `export NAME=value` */
  exported: boolean;
  layout?: Layout;
}

// =============================================================================
// Redirections
// =============================================================================

export type RedirectionOperator =
  | "<"
  | ">"
  | ">>"
  | ">|"
  | "<>"
  | "<&"
  | ">&"
  | "&>"
  | "&>>"
  | "<<"
  | "<<-"
  | "<<<";

export interface HereDocument {
  delimiter: string;
  /** Any part of the delimiter was quoted: the body is literal text */
  quoted: boolean;
  /** `<<-`: leading tabs are stripped from body lines */
  stripTabs: boolean;
  /** Body exactly as written, without the closing delimiter line */
  content: string;
  /** Parsed body for unquoted delimiters; null when quoted */
  body: Word | null;
}

export interface Redirection extends BaseNode {
  type: "Redirection";
  operator: RedirectionOperator;
  fd: number | null;
  /** Target word; for here-documents the delimiter word as written */
  target: Word;
  heredoc: HereDocument | null;
}

// =============================================================================
// Words and Expansions
// =============================================================================

export interface Word extends BaseNode {
  type: "Word";
  parts: WordPart[];
}

export type WordPart =
  | Literal
  | SingleQuoted
  | DoubleQuoted
  | AnsiCQuoted
  | ParameterExpansion
  | CommandSubstitution
  | ArithmeticExpansion
  | ProcessSubstitution;

export type DoubleQuotedPart =
  | Literal
  | ParameterExpansion
  | CommandSubstitution
  | ArithmeticExpansion;

/** Unquoted text as written, escapes included */
export interface Literal extends BaseNode {
  type: "Literal";
  value: string;
}

export interface SingleQuoted extends BaseNode {
  type: "SingleQuoted";
  value: string;
}

export interface DoubleQuoted extends BaseNode {
  type: "DoubleQuoted";
  parts: DoubleQuotedPart[];
}

/** `$'...'`, content kept raw */
export interface AnsiCQuoted extends BaseNode {
  type: "AnsiCQuoted";
  value: string;
}

export type ParameterModifier =
  | ":-"
  | "-"
  | ":="
  | "="
  | ":?"
  | "?"
  | ":+"
  | "+"
  | "#"
  | "##"
  | "%"
  | "%%"
  | "/"
  | "//"
  | "/#"
  | "/%"
  | "^"
  | "^^"
  | ","
  | ",,"
  | ":";

export interface ParameterExpansion extends BaseNode {
  type: "ParameterExpansion";
  parameter: string;
  /** Written as `${...}` rather than `$name` */
  braced: boolean;
  /** `${#name}` */
  length: boolean;
  /** `${!name}` */
  indirect: boolean;
  subscript: string | null;
  modifier: ParameterModifier | null;
  argument: Word | null;
}

export interface CommandSubstitution extends BaseNode {
  type: "CommandSubstitution";
  body: Statement[];
  backtick: boolean;
}

export interface ArithmeticExpansion extends BaseNode {
  type: "ArithmeticExpansion";
  /** Null when the text is outside the supported arithmetic grammar */
  expression: ArithmeticExpression | null;
  raw: string;
}

export interface ProcessSubstitution extends BaseNode {
  type: "ProcessSubstitution";
  direction: "<" | ">";
  body: Statement[];
}

// =============================================================================
// Test Expressions ([[ ]])
// =============================================================================

export type TestExpression =
  | UnaryTest
  | BinaryTest
  | LogicalTest
  | NotTest
  | GroupedTest
  | WordTest;

export type UnaryTestOperator =
  | "-a"
  | "-b"
  | "-c"
  | "-d"
  | "-e"
  | "-f"
  | "-g"
  | "-h"
  | "-k"
  | "-p"
  | "-r"
  | "-s"
  | "-t"
  | "-u"
  | "-w"
  | "-x"
  | "-G"
  | "-L"
  | "-N"
  | "-O"
  | "-S"
  | "-z"
  | "-n"
  | "-o"
  | "-v"
  | "-R";

export type BinaryTestOperator =
  | "="
  | "=="
  | "!="
  | "=~"
  | "<"
  | ">"
  | "-eq"
  | "-ne"
  | "-lt"
  | "-le"
  | "-gt"
  | "-ge"
  | "-nt"
  | "-ot"
  | "-ef";

export interface UnaryTest extends BaseNode {
  type: "UnaryTest";
  operator: UnaryTestOperator;
  operand: Word;
}

export interface BinaryTest extends BaseNode {
  type: "BinaryTest";
  operator: BinaryTestOperator;
  left: Word;
  right: Word;
}

export interface LogicalTest extends BaseNode {
  type: "LogicalTest";
  operator: "&&" | "||";
  left: TestExpression;
  right: TestExpression;
}

export interface NotTest extends BaseNode {
  type: "NotTest";
  expression: TestExpression;
}

export interface GroupedTest extends BaseNode {
  type: "GroupedTest";
  expression: TestExpression;
}

/** `[[ word ]]`: true when the word is non-empty */
export interface WordTest extends BaseNode {
  type: "WordTest";
  word: Word;
}

export interface TestCommand extends BaseNode {
  type: "TestCommand";
  expression: TestExpression;
  redirects: Redirection[];
  layout?: Layout;
}

// =============================================================================
// Arithmetic
// =============================================================================

export type ArithmeticExpression =
  | NumberLiteral
  | VariableReference
  | ParameterExpansion
  | BinaryArithmeticExpression
  | UnaryArithmeticExpression
  | ConditionalArithmeticExpression
  | AssignmentExpression
  | GroupedArithmeticExpression;

export interface NumberLiteral extends BaseNode {
  type: "NumberLiteral";
  value: number;
  /** Digits as written (keeps hex and octal forms) */
  raw: string;
}

export interface VariableReference extends BaseNode {
  type: "VariableReference";
  name: string;
  /** Written with a leading `$` */
  dollar: boolean;
}

export type BinaryArithmeticOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "**"
  | "<<"
  | ">>"
  | "<"
  | ">"
  | "<="
  | ">="
  | "=="
  | "!="
  | "&"
  | "^"
  | "|"
  | "&&"
  | "||"
  | ",";

export interface BinaryArithmeticExpression extends BaseNode {
  type: "BinaryArithmeticExpression";
  operator: BinaryArithmeticOperator;
  left: ArithmeticExpression;
  right: ArithmeticExpression;
}

export interface UnaryArithmeticExpression extends BaseNode {
  type: "UnaryArithmeticExpression";
  operator: "-" | "+" | "!" | "~" | "++" | "--";
  argument: ArithmeticExpression;
  prefix: boolean;
}

export interface ConditionalArithmeticExpression extends BaseNode {
  type: "ConditionalArithmeticExpression";
  test: ArithmeticExpression;
  consequent: ArithmeticExpression;
  alternate: ArithmeticExpression;
}

export type AssignmentOperator =
  | "="
  | "+="
  | "-="
  | "*="
  | "/="
  | "%="
  | "<<="
  | ">>="
  | "&="
  | "|="
  | "^=";

export interface AssignmentExpression extends BaseNode {
  type: "AssignmentExpression";
  operator: AssignmentOperator;
  left: VariableReference;
  right: ArithmeticExpression;
}

export interface GroupedArithmeticExpression extends BaseNode {
  type: "GroupedArithmeticExpression";
  expression: ArithmeticExpression;
}

export interface ArithmeticCommand extends BaseNode {
  type: "ArithmeticCommand";
  expression: ArithmeticExpression | null;
  raw: string;
  redirects: Redirection[];
  layout?: Layout;
}

// =============================================================================
// Node union
// =============================================================================

export type Node =
  | Program
  | Statement
  | CaseClause
  | Redirection
  | Word
  | WordPart
  | ArrayLiteral
  | TestExpression
  | ArithmeticExpression;
