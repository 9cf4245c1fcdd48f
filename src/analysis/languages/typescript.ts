import ts from "typescript";
import type { LanguageId, LineRange } from "../../types.js";
import { matchCalls } from "../calleeMatch.js";
import {
  findEnclosingDeclaration,
  uniqueStrings,
  type ConditionCheck,
  type LanguageModule,
  type ParseOptions,
  type ParseResult,
  type SyntaxAssignment,
  type SyntaxCall,
  type SyntaxCondition,
  type SyntaxDeclaration,
  type SyntaxTree
} from "../syntax.js";

// Method bodies cut out of a class only parse inside one.
const CLASS_WRAPPER = "class __fragment__ {";

const TYPE_CHECK_CALLEES = new Set([
  "Array.isArray",
  "Number.isInteger",
  "Number.isSafeInteger",
  "Number.isFinite",
  "Number.isNaN",
  "isNaN",
  "isFinite"
]);
const FORMAT_METHODS = new Set(["test", "match", "matchAll", "search", "startsWith", "endsWith"]);
const ALLOW_LIST_METHODS = new Set(["includes", "has", "indexOf"]);

type BuildContext = {
  sourceFile: ts.SourceFile;
  startLine: number;
  lineOffset: number;
};

function scriptKindFor(language: LanguageId, fileName?: string): ts.ScriptKind {
  if (fileName && /\.tsx$/i.test(fileName)) return ts.ScriptKind.TSX;
  if (language === "javascript") return ts.ScriptKind.JSX;
  return ts.ScriptKind.TS;
}

function firstErrorNode(sourceFile: ts.SourceFile): ts.Node | null {
  let found: ts.Node | null = null;
  const visit = (node: ts.Node): void => {
    if (found) return;
    if ((node.flags & ts.NodeFlags.ThisNodeHasError) !== 0) {
      found = node;
      return;
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return found;
}

function lineOf(ctx: BuildContext, position: number): number {
  return ctx.startLine + ctx.sourceFile.getLineAndCharacterOfPosition(position).line - ctx.lineOffset;
}

function rangeOf(ctx: BuildContext, node: ts.Node) {
  return {
    startLine: lineOf(ctx, node.getStart(ctx.sourceFile)),
    endLine: lineOf(ctx, node.getEnd())
  };
}

// Comments sharing a line with the previous token belong to that token.
function statementRangeOf(ctx: BuildContext, node: ts.Node): LineRange {
  const range = rangeOf(ctx, node);
  const previousLine = lineOf(ctx, node.getFullStart());
  for (const comment of ts.getLeadingCommentRanges(ctx.sourceFile.text, node.getFullStart()) ?? []) {
    const line = lineOf(ctx, comment.pos);
    if (line > previousLine || node.getFullStart() === 0) {
      range.startLine = Math.min(range.startLine, line);
      break;
    }
  }
  return range;
}

export function calleePath(expression: ts.Expression): string {
  if (ts.isIdentifier(expression)) return expression.text;
  if (expression.kind === ts.SyntaxKind.ThisKeyword) return "this";
  if (ts.isPropertyAccessExpression(expression)) {
    return `${calleePath(expression.expression)}.${expression.name.text}`;
  }
  if (ts.isElementAccessExpression(expression)) {
    const key = expression.argumentExpression;
    const name = ts.isStringLiteralLike(key) ? key.text : "<expr>";
    return `${calleePath(expression.expression)}.${name}`;
  }
  if (ts.isCallExpression(expression)) return `${calleePath(expression.expression)}()`;
  if (
    ts.isParenthesizedExpression(expression) ||
    ts.isNonNullExpression(expression) ||
    ts.isAsExpression(expression)
  ) {
    return calleePath(expression.expression);
  }
  return "<expr>";
}

function collectIdentifiers(node: ts.Node, into: Set<string>): void {
  if (ts.isIdentifier(node)) {
    if (node.text !== "undefined") into.add(node.text);
    return;
  }
  if (ts.isTypeNode(node) || ts.isFunctionLike(node)) return;
  if (ts.isPropertyAccessExpression(node)) {
    collectIdentifiers(node.expression, into);
    return;
  }
  if (ts.isCallExpression(node) || ts.isNewExpression(node)) {
    const callee = node.expression;
    if (ts.isPropertyAccessExpression(callee) || ts.isElementAccessExpression(callee)) {
      collectIdentifiers(callee.expression, into);
    } else if (!ts.isIdentifier(callee)) {
      collectIdentifiers(callee, into);
    }
    for (const arg of node.arguments ?? []) collectIdentifiers(arg, into);
    return;
  }
  if (ts.isTaggedTemplateExpression(node)) {
    collectIdentifiers(node.template, into);
    return;
  }
  if (ts.isPropertyAssignment(node)) {
    collectIdentifiers(node.initializer, into);
    return;
  }
  if (ts.isJsxAttribute(node)) {
    if (node.initializer) collectIdentifiers(node.initializer, into);
    return;
  }
  ts.forEachChild(node, (child) => collectIdentifiers(child, into));
}

function identifiersOf(nodes: readonly ts.Node[]): string[] {
  const into = new Set<string>();
  for (const node of nodes) collectIdentifiers(node, into);
  return [...into];
}

function receiverOf(callee: ts.Expression): string | null {
  if (ts.isPropertyAccessExpression(callee) || ts.isElementAccessExpression(callee)) {
    return identifiersOf([callee.expression])[0] ?? null;
  }
  return null;
}

function bindingNames(name: ts.BindingName): string[] {
  if (ts.isIdentifier(name)) return [name.text];
  const names: string[] = [];
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) names.push(...bindingNames(element.name));
  }
  return names;
}

function propertyNameText(name: ts.PropertyName): string {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return "<computed>";
}

function isLiteralOperand(node: ts.Expression): boolean {
  return ts.isStringLiteralLike(node) || ts.isNumericLiteral(node);
}

const RELATIONAL_OPERATORS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.LessThanToken,
  ts.SyntaxKind.GreaterThanToken,
  ts.SyntaxKind.LessThanEqualsToken,
  ts.SyntaxKind.GreaterThanEqualsToken
]);

const EQUALITY_OPERATORS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.EqualsEqualsEqualsToken,
  ts.SyntaxKind.ExclamationEqualsEqualsToken,
  ts.SyntaxKind.EqualsEqualsToken,
  ts.SyntaxKind.ExclamationEqualsToken
]);

function collectChecks(node: ts.Node, checks: Set<ConditionCheck>, calls: string[]): void {
  if (ts.isFunctionLike(node)) return;
  if (ts.isTypeOfExpression(node)) {
    checks.add("type");
  } else if (ts.isBinaryExpression(node)) {
    const operator = node.operatorToken.kind;
    if (operator === ts.SyntaxKind.InstanceOfKeyword) {
      checks.add("type");
    } else if (operator === ts.SyntaxKind.InKeyword) {
      checks.add("allow-list");
    } else if (RELATIONAL_OPERATORS.has(operator)) {
      checks.add("range");
    } else if (
      EQUALITY_OPERATORS.has(operator) &&
      !ts.isTypeOfExpression(node.left) &&
      !ts.isTypeOfExpression(node.right) &&
      (isLiteralOperand(node.left) || isLiteralOperand(node.right))
    ) {
      checks.add("allow-list");
    }
  } else if (ts.isCallExpression(node)) {
    const callee = calleePath(node.expression);
    calls.push(callee);
    const method = callee.slice(callee.lastIndexOf(".") + 1);
    if (TYPE_CHECK_CALLEES.has(callee)) {
      checks.add("type");
    } else if (callee.includes(".") && FORMAT_METHODS.has(method)) {
      checks.add("format");
    } else if (callee.includes(".") && ALLOW_LIST_METHODS.has(method)) {
      checks.add("allow-list");
    }
  }
  ts.forEachChild(node, (child) => collectChecks(child, checks, calls));
}

function buildCondition(ctx: BuildContext, expression: ts.Expression): SyntaxCondition {
  const checks = new Set<ConditionCheck>();
  const calls: string[] = [];
  collectChecks(expression, checks, calls);
  return {
    range: rangeOf(ctx, expression),
    identifiers: identifiersOf([expression]),
    checks: [...checks],
    calls: uniqueStrings(calls)
  };
}

function buildCall(
  ctx: BuildContext,
  node: ts.Node,
  callee: ts.Expression,
  args: readonly ts.Node[]
): SyntaxCall {
  return {
    callee: calleePath(callee),
    range: rangeOf(ctx, node),
    receiver: receiverOf(callee),
    args: identifiersOf(args)
  };
}

function functionName(node: ts.ArrowFunction | ts.FunctionExpression): string {
  const parent = node.parent;
  if (ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) return parent.name.text;
  if (ts.isPropertyAssignment(parent) || ts.isPropertyDeclaration(parent)) {
    return propertyNameText(parent.name);
  }
  if (ts.isCallExpression(parent)) return `${calleePath(parent.expression)} callback`;
  if (ts.isFunctionExpression(node) && node.name) return node.name.text;
  return "<anonymous>";
}

function declarationName(node: ts.Node): string | null {
  if (ts.isFunctionDeclaration(node)) return node.name?.text ?? "<anonymous>";
  if (ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) {
    return propertyNameText(node.name);
  }
  if (ts.isConstructorDeclaration(node)) return "constructor";
  if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) return functionName(node);
  return null;
}

function buildTree(
  language: LanguageId,
  sourceFile: ts.SourceFile,
  options: ParseOptions,
  lineOffset: number,
  lineCount: number
): SyntaxTree {
  const ctx: BuildContext = { sourceFile, startLine: options.startLine, lineOffset };
  const calls: SyntaxCall[] = [];
  const conditions: SyntaxCondition[] = [];
  const assignments: SyntaxAssignment[] = [];
  const declarations: SyntaxDeclaration[] = [];

  const addAssignments = (targets: string[], sources: string[], node: ts.Node) => {
    const line = lineOf(ctx, node.getStart(sourceFile));
    for (const target of targets) assignments.push({ target, line, sources });
  };

  const visit = (node: ts.Node): void => {
    if (ts.isCallExpression(node)) {
      calls.push(buildCall(ctx, node, node.expression, node.arguments));
    } else if (ts.isNewExpression(node)) {
      calls.push(buildCall(ctx, node, node.expression, node.arguments ?? []));
    } else if (ts.isTaggedTemplateExpression(node)) {
      calls.push(buildCall(ctx, node, node.tag, [node.template]));
    } else if (ts.isIfStatement(node) || ts.isWhileStatement(node) || ts.isDoStatement(node)) {
      conditions.push(buildCondition(ctx, node.expression));
    } else if (ts.isConditionalExpression(node)) {
      conditions.push(buildCondition(ctx, node.condition));
    } else if (ts.isVariableDeclaration(node) && node.initializer) {
      addAssignments(bindingNames(node.name), identifiersOf([node.initializer]), node);
    } else if (
      ts.isBinaryExpression(node) &&
      node.operatorToken.kind >= ts.SyntaxKind.FirstAssignment &&
      node.operatorToken.kind <= ts.SyntaxKind.LastAssignment
    ) {
      addAssignments(identifiersOf([node.left]), identifiersOf([node.right]), node);
    } else if (ts.isForOfStatement(node) || ts.isForInStatement(node)) {
      const initializer = node.initializer;
      const targets = ts.isVariableDeclarationList(initializer)
        ? initializer.declarations.flatMap((declaration) => bindingNames(declaration.name))
        : identifiersOf([initializer]);
      addAssignments(targets, identifiersOf([node.expression]), node);
    }

    const name = declarationName(node);
    if (name !== null) declarations.push({ name, range: rangeOf(ctx, node) });

    ts.forEachChild(node, visit);
  };
  visit(sourceFile);

  // Inside the class wrapper the members are the outermost statements.
  const outer: readonly ts.Node[] =
    lineOffset === 0
      ? sourceFile.statements
      : sourceFile.statements.flatMap((statement) =>
          ts.isClassDeclaration(statement) ? [...statement.members] : []
        );
  const statements = outer.map((node) => statementRangeOf(ctx, node));

  return {
    language,
    range: { startLine: options.startLine, endLine: options.startLine + lineCount - 1 },
    calls,
    conditions,
    assignments,
    declarations,
    statements
  };
}

function createSource(text: string, options: ParseOptions, kind: ts.ScriptKind): ts.SourceFile {
  return ts.createSourceFile(options.fileName ?? "fragment.ts", text, ts.ScriptTarget.Latest, true, kind);
}

export function parseTypeScriptFragment(
  language: LanguageId,
  source: string,
  options: ParseOptions
): ParseResult {
  const kind = scriptKindFor(language, options.fileName);
  const lineCount = source.split("\n").length;

  const direct = createSource(source, options, kind);
  const directError = firstErrorNode(direct);
  if (!directError) {
    return { ok: true, tree: buildTree(language, direct, options, 0, lineCount) };
  }

  const wrapped = createSource(`${CLASS_WRAPPER}\n${source}\n}`, options, kind);
  if (!firstErrorNode(wrapped)) {
    return { ok: true, tree: buildTree(language, wrapped, options, 1, lineCount) };
  }

  const line = options.startLine + direct.getLineAndCharacterOfPosition(directError.getStart(direct)).line;
  return { ok: false, reason: `syntax error near line ${line}` };
}

function createTypeScriptFamilyModule(id: LanguageId): LanguageModule {
  return {
    id,
    parse: (source, options) => parseTypeScriptFragment(id, source, options),
    matchCall: matchCalls,
    matchDeclaration: (tree, range) => findEnclosingDeclaration(tree.declarations, range)
  };
}

export const typescriptLanguage = createTypeScriptFamilyModule("typescript");
export const javascriptLanguage = createTypeScriptFamilyModule("javascript");
