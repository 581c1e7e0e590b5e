import { afterEach, describe, expect, test } from "vitest";
import { run, VERSION } from "../src/cli";
import {
  createOutputCollector,
  createWorkspace,
  readWorkspaceFile,
  removeWorkspace,
} from "./test-helpers";

const workspaces: string[] = [];

function workspace(files: Record<string, string>): string {
  const dir = createWorkspace(files);
  workspaces.push(dir);
  return dir;
}

afterEach(() => {
  workspaces.forEach(removeWorkspace);
  workspaces.length = 0;
});

describe("命令行", () => {
  test("成功时输出一行并返回 0", () => {
    const cwd = workspace({
      "patch_match.txt": "foo",
      "patch_replace.txt": "bar",
      "target.txt": "foo baz foo",
    });
    const { lines, output } = createOutputCollector();

    const code = run(["target.txt"], { cwd, output });

    expect(code).toBe(0);
    expect(lines).toEqual(["Successfully patched target.txt"]);
    expect(readWorkspaceFile(cwd, "target.txt")).toBe("bar baz bar");
  });

  test("没有参数时输出用法", () => {
    const cwd = workspace({});
    const { lines, output } = createOutputCollector();

    expect(run([], { cwd, output })).toBe(1);
    expect(lines).toEqual(["Usage: block-patch <target_file>"]);
  });

  test("多个参数时输出用法且不修改文件", () => {
    const cwd = workspace({
      "patch_match.txt": "foo",
      "patch_replace.txt": "bar",
      "a.txt": "foo",
      "b.txt": "foo",
    });
    const { lines, output } = createOutputCollector();

    expect(run(["a.txt", "b.txt"], { cwd, output })).toBe(1);
    expect(lines).toEqual(["Usage: block-patch <target_file>"]);
    expect(readWorkspaceFile(cwd, "a.txt")).toBe("foo");
    expect(readWorkspaceFile(cwd, "b.txt")).toBe("foo");
  });

  test("缺少替换文件时报告配置错误", () => {
    const cwd = workspace({
      "patch_match.txt": "foo",
      "target.txt": "foo",
    });
    const { lines, output } = createOutputCollector();

    expect(run(["target.txt"], { cwd, output })).toBe(1);
    expect(lines).toEqual([
      "Error: patch_match.txt and patch_replace.txt must exist.",
    ]);
    expect(readWorkspaceFile(cwd, "target.txt")).toBe("foo");
  });

  test("未找到匹配时输出两行", () => {
    const cwd = workspace({
      "patch_match.txt": "xyz",
      "patch_replace.txt": "q",
      "target.txt": "abc",
    });
    const { lines, output } = createOutputCollector();

    expect(run(["target.txt"], { cwd, output })).toBe(1);
    expect(lines).toEqual([
      "Error: Match text not found in target.txt",
      "Searching for: xyz...",
    ]);
    expect(readWorkspaceFile(cwd, "target.txt")).toBe("abc");
  });

  test("目标文件不存在时报告读取错误", () => {
    const cwd = workspace({
      "patch_match.txt": "foo",
      "patch_replace.txt": "bar",
    });
    const { lines, output } = createOutputCollector();

    expect(run(["nope.txt"], { cwd, output })).toBe(1);
    expect(lines).toEqual(["Error: Failed to read file: nope.txt"]);
  });

  test("--match-file 和 --replace-file 指定伴随文件", () => {
    const cwd = workspace({
      "m.txt": "one",
      "r.txt": "two",
      "target.txt": "one, one",
    });
    const { lines, output } = createOutputCollector();

    const code = run(
      ["--match-file", "m.txt", "-r", "r.txt", "target.txt"],
      { cwd, output }
    );

    expect(code).toBe(0);
    expect(lines).toEqual(["Successfully patched target.txt"]);
    expect(readWorkspaceFile(cwd, "target.txt")).toBe("two, two");
  });

  test("指定的伴随文件缺失时错误信息使用其名称", () => {
    const cwd = workspace({ "target.txt": "x" });
    const { lines, output } = createOutputCollector();

    run(["-m", "m.txt", "target.txt"], { cwd, output });

    expect(lines).toEqual([
      "Error: m.txt and patch_replace.txt must exist.",
    ]);
  });

  test("--verbose 输出错误代码和建议", () => {
    const cwd = workspace({
      "patch_match.txt": "xyz",
      "patch_replace.txt": "q",
      "target.txt": "abc",
    });
    const { lines, output } = createOutputCollector();

    expect(run(["--verbose", "target.txt"], { cwd, output })).toBe(1);
    expect(lines).toEqual([
      [
        "[MATCH001] Match text not found in target.txt",
        "File: target.txt",
        "Searching for: xyz...",
        "Suggestion: The match text must appear verbatim in target.txt, including indentation and line endings; it may already have been patched",
      ].join("\n"),
    ]);
  });

  test("--verbose 成功时输出替换次数", () => {
    const cwd = workspace({
      "patch_match.txt": "a",
      "patch_replace.txt": "b",
      "target.txt": "a a a",
    });
    const { lines, output } = createOutputCollector();

    expect(run(["-v", "target.txt"], { cwd, output })).toBe(0);
    expect(lines).toEqual([
      "Successfully patched target.txt",
      "Replaced 3 occurrence(s)",
    ]);
  });

  test("--version 输出版本号", () => {
    const { lines, output } = createOutputCollector();

    expect(run(["--version"], { output })).toBe(0);
    expect(lines).toEqual([VERSION]);
  });

  test("--help 输出用法", () => {
    const { lines, output } = createOutputCollector();

    expect(run(["--help"], { output })).toBe(0);
    expect(lines[0].split("\n")[0]).toBe(
      "Usage: block-patch [options] <target_file>"
    );
  });

  test("以 - 开头的目标路径放在 -- 之后", () => {
    const cwd = workspace({
      "patch_match.txt": "foo",
      "patch_replace.txt": "bar",
      "-notes.txt": "foo",
    });
    const { lines, output } = createOutputCollector();

    expect(run(["--", "-notes.txt"], { cwd, output })).toBe(0);
    expect(lines).toEqual(["Successfully patched -notes.txt"]);
    expect(readWorkspaceFile(cwd, "-notes.txt")).toBe("bar");
  });

  test("未知选项返回 1", () => {
    const { lines, output } = createOutputCollector();

    expect(run(["--nope", "target.txt"], { output })).toBe(1);
    expect(lines[0]).toContain("unknown option '--nope'");
  });
});
