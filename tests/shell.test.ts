import { describe, expect, it } from "vitest";
import { CommandFailedError, CommandTimeoutError, RemoteUnreachableError } from "../lib/errors";
import {
  LineSplitter,
  LocalShell,
  execOrThrow,
  readRemoteFile,
  renderScript,
  runScript,
  shellQuote,
  validateTargetHost,
  writeRemoteFileAtomic,
} from "../lib/shell";
import { FakeShell } from "./helpers/fake-shell";

describe("shellQuote", () => {
  it("single-quotes and escapes embedded quotes", () => {
    expect(shellQuote("/srv/humidor")).toBe("'/srv/humidor'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote("")).toBe("''");
  });
});

describe("renderScript", () => {
  it("exports variables sorted by name ahead of the script", () => {
    expect(renderScript("echo ready", { RAILS_ENV: "production", DATABASE_PASSWORD: "a b'c" })).toBe(
      "export DATABASE_PASSWORD='a b'\\''c'\nexport RAILS_ENV='production'\nset -e\necho ready\n",
    );
  });
});

describe("LineSplitter", () => {
  it("emits complete lines and holds back the tail until flushed", () => {
    const lines: string[] = [];
    const splitter = new LineSplitter((line) => lines.push(line));

    splitter.push("one\ntw");
    splitter.push("o\r\nthr");
    expect(lines).toEqual(["one", "two"]);

    splitter.flush();
    expect(lines).toEqual(["one", "two", "thr"]);
  });
});

describe("validateTargetHost", () => {
  it("accepts aliases and user@host", () => {
    expect(validateTargetHost(" deploy@host.example.test ")).toBe("deploy@host.example.test");
    expect(validateTargetHost("prod")).toBe("prod");
  });

  it("rejects anything ssh could read as an option", () => {
    expect(() => validateTargetHost("-oProxyCommand=true")).toThrow(RemoteUnreachableError);
    expect(() => validateTargetHost("host name")).toThrow(RemoteUnreachableError);
  });
});

describe("remote file helpers", () => {
  it("returns null for a missing file and the content once written", async () => {
    const shell = new FakeShell();

    expect(await readRemoteFile(shell, "/etc/app.conf")).toBeNull();
    await writeRemoteFileAtomic(shell, "/etc/app.conf", "key=value\n");

    expect(await readRemoteFile(shell, "/etc/app.conf")).toBe("key=value\n");
    expect(shell.calls[1].command).toBe(
      "install -m 644 /dev/stdin '/etc/app.conf.hms-tmp' && mv -f '/etc/app.conf.hms-tmp' '/etc/app.conf'",
    );
  });

  it("raises on other read failures", async () => {
    const shell = new FakeShell();
    shell.failOn(/^cat /, "cat: /etc/app.conf: Permission denied\n");

    await expect(readRemoteFile(shell, "/etc/app.conf")).rejects.toThrow(CommandFailedError);
  });
});

describe("execOrThrow and runScript", () => {
  it("turns a non-zero exit into CommandFailedError with the label", async () => {
    const shell = new FakeShell();
    shell.failOn(/^false$/m, "nope\n", 2);

    await expect(execOrThrow(shell, "false", { label: "always fails" })).rejects.toThrow(
      "`always fails` exited with code 2: nope",
    );
  });

  it("feeds scripts over stdin as the requested user", async () => {
    const shell = new FakeShell();

    await runScript(shell, "echo ready", { label: "ready check", env: { TOKEN: "test-secret" }, user: "deploy" });

    expect(shell.calls[0]).toEqual({
      command: "sudo -u 'deploy' -H bash -s",
      input: "export TOKEN='test-secret'\nset -e\necho ready\n",
    });
  });
});

describe("LocalShell", () => {
  it("streams output lines and resolves non-zero exits", async () => {
    const lines: string[] = [];

    const result = await new LocalShell().exec("echo one; echo two >&2; exit 3", {
      onLine: (line, stream) => lines.push(`${stream}:${line}`),
    });

    expect(result).toEqual({ exitCode: 3, stdout: "one\n", stderr: "two\n" });
    expect(lines.sort()).toEqual(["stderr:two", "stdout:one"]);
  });

  it("passes stdin through", async () => {
    const result = await new LocalShell().exec("cat", { input: "hello\n" });
    expect(result.stdout).toBe("hello\n");
  });

  it("rejects with CommandTimeoutError when the command outlives its timeout", async () => {
    await expect(new LocalShell().exec("sleep 5", { timeoutMs: 100 })).rejects.toThrow(CommandTimeoutError);
  });
});
