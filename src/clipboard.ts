import { spawn } from "node:child_process";

export type ClipboardWriter = (text: string) => Promise<void>;

export type ClipboardCommand = {
  command: string;
  args: string[];
};

export type PipeToCommand = (candidate: ClipboardCommand, text: string) => Promise<void>;

const CLIPBOARD_TIMEOUT_MS = 2_000;

export function clipboardCommandsForPlatform(platform: NodeJS.Platform): ClipboardCommand[] {
  if (platform === "darwin") {
    return [{ command: "pbcopy", args: [] }];
  }
  if (platform === "win32") {
    return [{ command: "clip", args: [] }];
  }
  return [
    { command: "wl-copy", args: [] },
    { command: "xclip", args: ["-selection", "clipboard"] },
    { command: "xsel", args: ["--clipboard", "--input"] },
  ];
}

const pipeToCommand: PipeToCommand = (candidate, text) => {
  return new Promise((resolve, reject) => {
    const child = spawn(candidate.command, candidate.args, {
      stdio: ["pipe", "ignore", "pipe"],
      windowsHide: true,
    });
    let stderr = "";
    const timer = setTimeout(() => {
      child.kill("SIGTERM");
    }, CLIPBOARD_TIMEOUT_MS);

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.once("error", (error) => {
      clearTimeout(timer);
      reject(error);
    });
    child.once("close", (code) => {
      clearTimeout(timer);
      if (code === 0) {
        resolve();
        return;
      }
      const detail = stderr.trim();
      reject(new Error(`${candidate.command} exited with code ${code ?? "null"}${detail ? `: ${detail}` : ""}`));
    });
    child.stdin.on("error", (error) => {
      stderr += error.message;
    });
    child.stdin.end(text, "utf8");
  });
};

/**
 * Writes text to the system clipboard through the first copy helper that
 * works on this platform.
 */
export function createClipboardWriter(
  platform: NodeJS.Platform = process.platform,
  pipe: PipeToCommand = pipeToCommand,
): ClipboardWriter {
  const candidates = clipboardCommandsForPlatform(platform);
  return async (text) => {
    const failures: string[] = [];
    for (const candidate of candidates) {
      try {
        await pipe(candidate, text);
        return;
      } catch (error) {
        failures.push(error instanceof Error ? error.message : String(error));
      }
    }
    throw new Error(`no clipboard helper succeeded (${failures.join("; ")})`);
  };
}

export const writeClipboardText: ClipboardWriter = createClipboardWriter();
