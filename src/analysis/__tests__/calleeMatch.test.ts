import assert from "node:assert/strict";
import { test } from "node:test";
import { calleeMatches, firstMatchingPattern, matchCalls } from "../calleeMatch.js";
import type { SyntaxTree } from "../syntax.js";

test("plain patterns match trailing callee segments", () => {
  assert.equal(calleeMatches("child_process.exec", "exec"), true);
  assert.equal(calleeMatches("exec", "exec"), true);
  assert.equal(calleeMatches("execFile", "exec"), false);
  assert.equal(calleeMatches("db.query().where", "where"), true);
});

test("wildcards stand for one segment or part of a segment", () => {
  assert.equal(calleeMatches("this.prisma.user.findMany", "prisma.*.findMany"), true);
  assert.equal(calleeMatches("findMany", "*.findMany"), false);
  assert.equal(calleeMatches("validator.isEmail", "validator.is*"), true);
  assert.equal(calleeMatches("validator.escape", "validator.is*"), false);
  assert.equal(calleeMatches("isValidUser", "isValid*"), true);
});

test("a leading caret anchors the pattern at the first segment", () => {
  assert.equal(calleeMatches("exec", "^exec"), true);
  assert.equal(calleeMatches("cp.exec", "^exec"), false);
  assert.equal(calleeMatches("regex.exec", "^exec"), false);
});

test("pattern characters other than the wildcard are literal", () => {
  assert.equal(calleeMatches("prisma.$queryRaw", "$queryRaw"), true);
  assert.equal(calleeMatches("prisma.queryRaw", "$queryRaw"), false);
  assert.equal(calleeMatches("a.b", "a+b"), false);
});

test("firstMatchingPattern and matchCalls report the first pattern that matches", () => {
  assert.equal(firstMatchingPattern("cursor.execute", ["^execute", "*.execute", "execute"]), "*.execute");
  assert.equal(firstMatchingPattern("cursor.fetchall", ["*.execute"]), null);

  const tree: SyntaxTree = {
    language: "python",
    range: { startLine: 1, endLine: 2 },
    calls: [
      { callee: "os.system", range: { startLine: 1, endLine: 1 }, receiver: "os", args: ["cmd"] },
      { callee: "print", range: { startLine: 2, endLine: 2 }, receiver: null, args: ["cmd"] }
    ],
    conditions: [],
    assignments: [],
    declarations: [],
    statements: []
  };

  const matches = matchCalls(tree, ["os.system", "subprocess.run"]);

  assert.equal(matches.length, 1);
  assert.equal(matches[0].call.callee, "os.system");
  assert.equal(matches[0].pattern, "os.system");
  assert.deepEqual(matchCalls(tree, []), []);
});
