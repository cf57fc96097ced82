/**
 * Session probes - lock state and input idle time per platform
 *
 * Each platform shells out to a stock system tool. Output parsing is split
 * into pure functions so it can be tested without the tools present.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { getLogger } from "../logger";
import type { SessionProbe } from "./types";

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: readonly string[]) => Promise<string>;

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout } = await execFileAsync(file, [...args], { timeout: 5000, windowsHide: true });
  return stdout;
};

const WINDOWS_IDLE_SCRIPT = [
  "Add-Type @'",
  "using System;",
  "using System.Runtime.InteropServices;",
  "public static class IdleProbe {",
  "  [StructLayout(LayoutKind.Sequential)] struct LASTINPUTINFO { public uint cbSize; public uint dwTime; }",
  '  [DllImport("user32.dll")] static extern bool GetLastInputInfo(ref LASTINPUTINFO plii);',
  "  public static uint Idle() {",
  "    LASTINPUTINFO i = new LASTINPUTINFO();",
  "    i.cbSize = (uint)Marshal.SizeOf(i);",
  "    GetLastInputInfo(ref i);",
  "    return (uint)Environment.TickCount - i.dwTime;",
  "  }",
  "}",
  "'@",
  "[IdleProbe]::Idle()",
].join("\n");

export function parseMacLocked(output: string): boolean {
  return /"CGSSessionScreenIsLocked"\s*=\s*Yes/.test(output);
}

export function parseMacIdleMs(output: string): number {
  const match = /"HIDIdleTime"\s*=\s*(\d+)/.exec(output);
  if (!match) {
    throw new Error("HIDIdleTime not found in ioreg output");
  }
  return Math.floor(Number(match[1]) / 1_000_000);
}

export function parseLinuxLocked(output: string): boolean {
  return output.trim().toLowerCase() === "yes";
}

export function parseWindowsLocked(output: string): boolean {
  return /LogonUI\.exe/i.test(output);
}

export function parseMilliseconds(output: string): number {
  const value = Number(output.trim());
  if (!Number.isFinite(value) || value < 0 || output.trim() === "") {
    throw new Error(`Unexpected idle time output: "${output.trim()}"`);
  }
  return Math.floor(value);
}

class MacSessionProbe implements SessionProbe {
  constructor(private readonly run: CommandRunner) {}

  async isLocked(): Promise<boolean> {
    return parseMacLocked(await this.run("ioreg", ["-n", "Root", "-d1"]));
  }

  async idleMs(): Promise<number> {
    return parseMacIdleMs(await this.run("ioreg", ["-c", "IOHIDSystem", "-d", "4"]));
  }
}

class LinuxSessionProbe implements SessionProbe {
  constructor(
    private readonly run: CommandRunner,
    private readonly sessionId: string
  ) {}

  async isLocked(): Promise<boolean> {
    const output = await this.run("loginctl", [
      "show-session",
      this.sessionId,
      "-p",
      "LockedHint",
      "--value",
    ]);
    return parseLinuxLocked(output);
  }

  async idleMs(): Promise<number> {
    return parseMilliseconds(await this.run("xprintidle", []));
  }
}

class WindowsSessionProbe implements SessionProbe {
  constructor(private readonly run: CommandRunner) {}

  async isLocked(): Promise<boolean> {
    const output = await this.run("tasklist", ["/FI", "IMAGENAME eq LogonUI.exe", "/NH"]);
    return parseWindowsLocked(output);
  }

  async idleMs(): Promise<number> {
    const output = await this.run("powershell", [
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      WINDOWS_IDLE_SCRIPT,
    ]);
    return parseMilliseconds(output);
  }
}

/** Never locked, always active; used where no probe exists */
class UnsupportedSessionProbe implements SessionProbe {
  private warned = false;
  private readonly logger = getLogger("session-probe");

  constructor(private readonly platform: string) {}

  async isLocked(): Promise<boolean> {
    this.warnOnce();
    return false;
  }

  async idleMs(): Promise<number> {
    this.warnOnce();
    return 0;
  }

  private warnOnce(): void {
    if (this.warned) return;
    this.warned = true;
    this.logger.warn({ platform: this.platform }, "No session probe for platform; always active");
  }
}

export function createSessionProbe(
  platform: NodeJS.Platform = process.platform,
  run: CommandRunner = runCommand,
  env: NodeJS.ProcessEnv = process.env
): SessionProbe {
  switch (platform) {
    case "darwin":
      return new MacSessionProbe(run);
    case "linux":
      return new LinuxSessionProbe(run, env.XDG_SESSION_ID ?? "auto");
    case "win32":
      return new WindowsSessionProbe(run);
    default:
      return new UnsupportedSessionProbe(platform);
  }
}
