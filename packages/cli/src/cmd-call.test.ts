/**
 * Tests for ghexpr call command behavior.
 */
import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCall, parseCliArg } from "./cmd-call.js";

async function captureCall(
  fn: string,
  args: string[],
  opts: { trace?: string; pretty?: boolean; cwd?: string; homeDir?: string }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...a: unknown[]) => out.push(a.map(String).join(" "));
  console.error = (...a: unknown[]) => err.push(a.map(String).join(" "));

  try {
    const code = await runCall(fn, args, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("parseCliArg", () => {
  it("decodes JSON literals", () => {
    assert.deepEqual(parseCliArg("[1,2]").value, [1, 2]);
    assert.equal(parseCliArg("[1,2]").type, "array");
    assert.equal(parseCliArg("true").type, "bool");
    assert.equal(parseCliArg('"quoted"').value, "quoted");
    assert.equal(parseCliArg("null").type, "null");
  });

  it("falls back to a plain string", () => {
    const arg = parseCliArg("refs/heads/main");
    assert.equal(arg.type, "string");
    assert.equal(arg.value, "refs/heads/main");
  });
});

describe("ghexpr call", () => {
  let tmpDir = "";

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ghexpr-cli-call-"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("prints the typed result", async () => {
    const result = await captureCall("contains", ["Hello World", "world"], { cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 0);
    assert.equal(result.stderr, "");
    assert.equal(result.stdout, '{\n  "type": "bool",\n  "value": true\n}');
  });

  it("passes decoded JSON arguments through", async () => {
    const result = await captureCall("join", ['["a","b"]', "-"], { cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 0);
    assert.deepEqual(JSON.parse(result.stdout), { type: "string", value: "a-b" });
  });

  it("exits 2 on an unknown function", async () => {
    const result = await captureCall("hashfiles", ["x"], { cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 2);
    assert.equal(result.stdout, "");
    const diag = JSON.parse(result.stderr) as { code: string; message: string };
    assert.equal(diag.code, "E_UNKNOWN_FN");
    assert.equal(diag.message, "Unknown function 'hashfiles'.");
  });

  it("exits 2 on a wrong argument count", async () => {
    const result = await captureCall("fromjson", [], { cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 2);
    assert.equal((JSON.parse(result.stderr) as { code: string }).code, "E_ARITY");
  });

  it("exits 4 on an evaluation error, with pretty output", async () => {
    const result = await captureCall("fromjson", ['"not json"'], { pretty: true, cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith("error[E_JSON_PARSE]: unable to unmarshal `not json` fromjson: "));
    assert.ok(result.stderr.endsWith("\n  --> <unknown>\n  hint: fromjson() requires a valid JSON document."));
  });

  it("honours functions disabled in the project config", async () => {
    const projectDir = fs.mkdtempSync(path.join(os.tmpdir(), "ghexpr-cli-call-project-"));
    fs.writeFileSync(path.join(projectDir, ".ghexprrc.json"), JSON.stringify({ disable: ["tojson"] }));
    try {
      const result = await captureCall("tojson", ["1"], { cwd: projectDir, homeDir: tmpDir });
      assert.equal(result.code, 2);
      assert.equal((JSON.parse(result.stderr) as { code: string }).code, "E_UNKNOWN_FN");
    } finally {
      fs.rmSync(projectDir, { recursive: true, force: true });
    }
  });

  it("writes trace events as JSONL", async () => {
    const tracePath = path.join(tmpDir, "trace.jsonl");
    const result = await captureCall("startswith", ["HelloWorld", "hello"], {
      trace: tracePath,
      cwd: tmpDir,
      homeDir: tmpDir,
    });
    assert.equal(result.code, 0);
    const events = fs
      .readFileSync(tracePath, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line) as { event: string; fn: string; argc: number; data?: { type: string } });
    assert.deepEqual(events.map((e) => e.event), ["call_start", "call_end"]);
    assert.equal(events[0]?.fn, "startswith");
    assert.equal(events[0]?.argc, 2);
    assert.deepEqual(events[1]?.data, { type: "bool" });
  });

  it("exits 4 with E_IO when the trace file cannot be opened", async () => {
    const tracePath = path.join(tmpDir, "missing-dir", "trace.jsonl");
    const result = await captureCall("join", ["x"], { trace: tracePath, cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 4);
    assert.equal(result.stdout, "");
    assert.ok(result.stderr.startsWith('{"code":"E_IO","message":"Error opening trace file: '));
  });
});
