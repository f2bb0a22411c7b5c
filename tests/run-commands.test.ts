import { describe, expect, it } from "@jest/globals";
import path from "path";
import { quoteArg, runCommand } from "../src/core/utils/run-commands";

const cwd = path.resolve(__dirname, "..");

describe("runCommand", () => {
  it("returns ok on success", async () => {
    const result = await runCommand('node -e "console.log(\\"hi\\")"', cwd);
    expect(result.ok).toBe(true);
    expect(result.code).toBe(0);
    expect(result.stdout).toContain("hi");
  });

  it("returns failure metadata on non-zero exit", async () => {
    const result = await runCommand('node -e "process.exit(2)"', cwd);
    expect(result.ok).toBe(false);
    expect(result.code).toBe(2);
  });

  it("passes output chunks to the stream callbacks", async () => {
    const out: string[] = [];
    const err: string[] = [];
    const result = await runCommand('node -e "console.log(\\"out\\"); console.error(\\"err\\")"', cwd, {
      onStdout: (chunk) => out.push(chunk),
      onStderr: (chunk) => err.push(chunk),
    });

    expect(result.ok).toBe(true);
    expect(out.join("").trim()).toBe("out");
    expect(err.join("").trim()).toBe("err");
  });

  it("adds env entries to the child environment", async () => {
    const result = await runCommand('node -e "console.log(process.env.POSTGUIDE_TEST)"', cwd, {
      env: { POSTGUIDE_TEST: "from-test" },
    });
    expect(result.stdout.trim()).toBe("from-test");
  });
});

describe("quoteArg", () => {
  it("leaves plain arguments alone", () => {
    expect(quoteArg("hello-world", "linux")).toBe("hello-world");
    expect(quoteArg("http://localhost:4000", "linux")).toBe("http://localhost:4000");
  });

  it("single-quotes for POSIX shells", () => {
    expect(quoteArg("hello world", "linux")).toBe("'hello world'");
    expect(quoteArg("it's", "darwin")).toBe(`'it'"'"'s'`);
    expect(quoteArg("", "linux")).toBe("''");
  });

  it("double-quotes for cmd.exe", () => {
    expect(quoteArg("a b", "win32")).toBe('"a b"');
    expect(quoteArg('say "hi"', "win32")).toBe('"say ""hi"""');
  });
});
