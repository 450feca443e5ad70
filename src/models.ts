import { execFile } from "node:child_process";
import type { Model } from "./chat-types.js";

export type CommandRunner = (command: string, args: string[]) => Promise<{ stdout: string }>;

const ALIASES_MAX_BUFFER = 1024 * 1024;
const ALIASES_TIMEOUT_MS = 15_000;

/**
 * Parses the text listing printed by `llm aliases`, one `alias : model` pair
 * per line. The split happens at the first colon so model names that contain
 * colons survive.
 */
export function parseModelAliases(stdout: string): Model[] {
  const models: Model[] = [];
  const seen = new Set<string>();

  for (const rawLine of stdout.split(/\r?\n/)) {
    const separator = rawLine.indexOf(":");
    if (separator < 0) {
      continue;
    }
    const id = rawLine.slice(0, separator).trim();
    const name = rawLine.slice(separator + 1).trim();
    if (!id || !name || /\s/.test(id) || seen.has(id)) {
      continue;
    }
    seen.add(id);
    models.push({ id, name });
  }

  return models;
}

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: "utf8", maxBuffer: ALIASES_MAX_BUFFER, timeout: ALIASES_TIMEOUT_MS },
      (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim();
          reject(new Error(detail ? `${error.message}: ${detail}` : error.message));
          return;
        }
        resolve({ stdout });
      },
    );
  });

export async function fetchModelAliases(params: {
  command: string;
  run?: CommandRunner;
}): Promise<Model[]> {
  const run = params.run ?? runCommand;
  const { stdout } = await run(params.command, ["aliases"]);
  return parseModelAliases(stdout);
}

export function modelIdToLabel(model: Model): string {
  return model.name === model.id ? model.id : `${model.name} (${model.id})`;
}

export class ModelRegistry {
  private models: readonly Model[] = [];

  constructor(models: Model[] = []) {
    this.replace(models);
  }

  replace(models: Model[]): void {
    this.models = Object.freeze(models.map((model) => Object.freeze({ ...model })));
  }

  list(): readonly Model[] {
    return this.models;
  }

  get size(): number {
    return this.models.length;
  }

  has(id: string): boolean {
    return this.indexOf(id) >= 0;
  }

  at(index: number): Model | undefined {
    return this.models[index];
  }

  indexOf(id: string): number {
    return this.models.findIndex((model) => model.id === id);
  }

  pickDefault(preferred: string | null): string | null {
    if (preferred && this.has(preferred)) {
      return preferred;
    }
    return this.models[0]?.id ?? null;
  }
}
