import { describe, it, expect, vi } from "vitest";
import {
  createSessionProbe,
  parseLinuxLocked,
  parseMacIdleMs,
  parseMacLocked,
  parseMilliseconds,
  parseWindowsLocked,
  type CommandRunner,
} from "./session-probe";

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../logger", () => ({
  getLogger: vi.fn(() => mockLogger),
}));

describe("output parsers", () => {
  it("reads the macOS lock flag from ioreg", () => {
    const locked = '    "IOConsoleUsers" = ({"CGSSessionScreenIsLocked"=Yes,"kCGSSessionOnConsoleKey"=Yes})';
    const unlocked = '    "IOConsoleUsers" = ({"kCGSSessionOnConsoleKey"=Yes})';

    expect(parseMacLocked(locked)).toBe(true);
    expect(parseMacLocked(unlocked)).toBe(false);
  });

  it("converts HIDIdleTime nanoseconds to milliseconds", () => {
    expect(parseMacIdleMs('  |   "HIDIdleTime" = 4523000000\n')).toBe(4523);
    expect(() => parseMacIdleMs("no idle here")).toThrow("HIDIdleTime");
  });

  it("reads loginctl LockedHint", () => {
    expect(parseLinuxLocked("yes\n")).toBe(true);
    expect(parseLinuxLocked("no\n")).toBe(false);
  });

  it("detects LogonUI in tasklist output", () => {
    expect(parseWindowsLocked("LogonUI.exe                  1234 Console    1   12,345 K")).toBe(true);
    expect(parseWindowsLocked("INFO: No tasks are running which match the specified criteria.")).toBe(
      false
    );
  });

  it("parses millisecond counters and rejects garbage", () => {
    expect(parseMilliseconds("1520\n")).toBe(1520);
    expect(() => parseMilliseconds("")).toThrow();
    expect(() => parseMilliseconds("abc")).toThrow();
  });
});

describe("createSessionProbe", () => {
  it("runs loginctl for the configured session on Linux", async () => {
    const run = vi.fn<CommandRunner>(async () => "yes\n");
    const probe = createSessionProbe("linux", run, { XDG_SESSION_ID: "c2" });

    await expect(probe.isLocked()).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith("loginctl", ["show-session", "c2", "-p", "LockedHint", "--value"]);
  });

  it("uses xprintidle for Linux idle time", async () => {
    const run = vi.fn<CommandRunner>(async () => "90000\n");
    const probe = createSessionProbe("linux", run, {});

    await expect(probe.idleMs()).resolves.toBe(90_000);
    expect(run).toHaveBeenCalledWith("xprintidle", []);
  });

  it("uses ioreg on macOS", async () => {
    const run = vi.fn<CommandRunner>(async () => '"HIDIdleTime" = 2000000');
    const probe = createSessionProbe("darwin", run, {});

    await expect(probe.idleMs()).resolves.toBe(2);
    expect(run).toHaveBeenCalledWith("ioreg", ["-c", "IOHIDSystem", "-d", "4"]);
  });

  it("propagates command failures to the caller", async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw new Error("spawn tasklist ENOENT");
    });
    const probe = createSessionProbe("win32", run, {});

    await expect(probe.isLocked()).rejects.toThrow("ENOENT");
  });

  it("reports an unsupported platform as unlocked and active, warning once", async () => {
    const run = vi.fn<CommandRunner>();
    const probe = createSessionProbe("aix", run, {});

    await expect(probe.isLocked()).resolves.toBe(false);
    await expect(probe.idleMs()).resolves.toBe(0);
    expect(run).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });
});
