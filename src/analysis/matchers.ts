import type { LineRange, PatternTag } from "../types.js";
import type { PatternLists } from "../config/patternLists.js";
import type { LanguageModule, SyntaxCall, SyntaxTree } from "./syntax.js";
import { firstMatchingPattern } from "./calleeMatch.js";

export type MatcherContext = {
  tree: SyntaxTree;
  language: LanguageModule;
  lists: PatternLists;
  focus: LineRange;
  // Focus lines plus code-flow lines; where tainted data is used.
  sinkLines: ReadonlySet<number>;
  tainted: ReadonlySet<string>;
};

export type MatcherHit = {
  range: LineRange;
  rule: string;
};

export type PatternMatcher = {
  tag: Exclude<PatternTag, "none">;
  match: (ctx: MatcherContext) => MatcherHit[];
};

function touchesSink(range: LineRange, sinkLines: ReadonlySet<number>): boolean {
  for (let line = range.startLine; line <= range.endLine; line += 1) {
    if (sinkLines.has(line)) return true;
  }
  return false;
}

function beforeUse(range: LineRange, ctx: MatcherContext): boolean {
  return range.startLine <= ctx.focus.endLine;
}

function carriesTaint(identifiers: readonly string[], tainted: ReadonlySet<string>): boolean {
  return identifiers.some((identifier) => tainted.has(identifier));
}

function callReads(call: SyntaxCall): string[] {
  return call.receiver ? [...call.args, call.receiver] : call.args;
}

function ruleName(ctx: MatcherContext, tag: PatternTag, detail: string): string {
  return `${ctx.language.id}/${tag}:${detail.replace(/^\^/, "")}`;
}

/**
 * Seeds are the identifiers read by calls on sink lines (or by assignments
 * there when no call is present), closed backwards over earlier assignments.
 */
export function computeTaint(tree: SyntaxTree, sinkLines: ReadonlySet<number>): Set<string> {
  const tainted = new Set<string>();
  for (const call of tree.calls) {
    if (touchesSink(call.range, sinkLines)) {
      for (const identifier of call.args) tainted.add(identifier);
    }
  }
  if (tainted.size === 0) {
    for (const assignment of tree.assignments) {
      if (!sinkLines.has(assignment.line)) continue;
      tainted.add(assignment.target);
      for (const source of assignment.sources) tainted.add(source);
    }
  }

  const lastSink = Math.max(...sinkLines);
  let changed = true;
  while (changed) {
    changed = false;
    for (const assignment of tree.assignments) {
      if (assignment.line > lastSink || !tainted.has(assignment.target)) continue;
      for (const source of assignment.sources) {
        if (!tainted.has(source)) {
          tainted.add(source);
          changed = true;
        }
      }
    }
  }
  return tainted;
}

const validationMatcher: PatternMatcher = {
  tag: "validation",
  match: (ctx) => {
    const hits: MatcherHit[] = [];
    for (const condition of ctx.tree.conditions) {
      if (!beforeUse(condition.range, ctx) || !carriesTaint(condition.identifiers, ctx.tainted)) continue;
      const validator = condition.calls
        .map((callee) => firstMatchingPattern(callee, ctx.lists.validators))
        .find((pattern) => pattern !== null);
      const detail = condition.checks[0] ?? validator;
      if (detail) hits.push({ range: condition.range, rule: ruleName(ctx, "validation", detail) });
    }
    for (const { call, pattern } of ctx.language.matchCall(ctx.tree, ctx.lists.validators)) {
      if (beforeUse(call.range, ctx) && carriesTaint(callReads(call), ctx.tainted)) {
        hits.push({ range: call.range, rule: ruleName(ctx, "validation", pattern) });
      }
    }
    return hits;
  }
};

const sanitizerMatcher: PatternMatcher = {
  tag: "sanitizer",
  match: (ctx) =>
    ctx.language
      .matchCall(ctx.tree, ctx.lists.sanitizers)
      .filter(({ call }) => beforeUse(call.range, ctx) && carriesTaint(call.args, ctx.tainted))
      .map(({ call, pattern }) => ({ range: call.range, rule: ruleName(ctx, "sanitizer", pattern) }))
};

const frameworkGuardMatcher: PatternMatcher = {
  tag: "framework-guard",
  match: (ctx) =>
    ctx.language
      .matchCall(ctx.tree, ctx.lists.frameworkGuards)
      .filter(({ call }) => beforeUse(call.range, ctx) && carriesTaint(callReads(call), ctx.tainted))
      .map(({ call, pattern }) => ({ range: call.range, rule: ruleName(ctx, "framework-guard", pattern) }))
};

const unsafeCallMatcher: PatternMatcher = {
  tag: "unsafe-call",
  match: (ctx) =>
    ctx.language
      .matchCall(ctx.tree, ctx.lists.unsafeCalls)
      .filter(({ call }) => touchesSink(call.range, ctx.sinkLines) && carriesTaint(call.args, ctx.tainted))
      .map(({ call, pattern }) => ({ range: call.range, rule: ruleName(ctx, "unsafe-call", pattern) }))
};

export const PATTERN_MATCHERS: readonly PatternMatcher[] = [
  validationMatcher,
  sanitizerMatcher,
  frameworkGuardMatcher,
  unsafeCallMatcher
];
