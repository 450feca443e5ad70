import { describe, expect, it, vi } from "vitest";
import { fetchModelAliases, ModelRegistry, modelIdToLabel, parseModelAliases } from "./models.js";

const ALIASES = [
  "4o          : gpt-4o",
  "3.5         : gpt-3.5-turbo",
  "claude      : anthropic/claude-3-5-sonnet-latest",
  "",
  "not an alias line",
  "local : ollama:llama3",
  "4o : gpt-4o-duplicate",
  "bad id : something",
  " : missing-id",
].join("\n");

describe("parseModelAliases", () => {
  it("reads alias lines and skips malformed or duplicate entries", () => {
    expect(parseModelAliases(ALIASES)).toEqual([
      { id: "4o", name: "gpt-4o" },
      { id: "3.5", name: "gpt-3.5-turbo" },
      { id: "claude", name: "anthropic/claude-3-5-sonnet-latest" },
      { id: "local", name: "ollama:llama3" },
    ]);
  });

  it("accepts windows line endings", () => {
    expect(parseModelAliases("a : b\r\nc : d\r\n")).toEqual([
      { id: "a", name: "b" },
      { id: "c", name: "d" },
    ]);
  });
});

describe("fetchModelAliases", () => {
  it("runs the aliases subcommand of the configured tool", async () => {
    const run = vi.fn(async (_command: string, _args: string[]) => ({ stdout: "4o : gpt-4o\n" }));
    await expect(fetchModelAliases({ command: "/opt/llm", run })).resolves.toEqual([{ id: "4o", name: "gpt-4o" }]);
    expect(run).toHaveBeenCalledWith("/opt/llm", ["aliases"]);
  });

  it("propagates runner failures", async () => {
    const run = async () => {
      throw new Error("spawn llm ENOENT");
    };
    await expect(fetchModelAliases({ command: "llm", run })).rejects.toThrow("spawn llm ENOENT");
  });
});

describe("ModelRegistry", () => {
  it("keeps the model list in insertion order and answers lookups", () => {
    const registry = new ModelRegistry([
      { id: "4o", name: "gpt-4o" },
      { id: "claude", name: "claude-3-5-sonnet" },
    ]);

    expect(registry.size).toBe(2);
    expect(registry.indexOf("claude")).toBe(1);
    expect(registry.at(0)).toEqual({ id: "4o", name: "gpt-4o" });
    expect(registry.at(5)).toBeUndefined();
    expect(registry.has("missing")).toBe(false);
    expect(Object.isFrozen(registry.list())).toBe(true);
  });

  it("prefers a known default and otherwise picks the first model", () => {
    const registry = new ModelRegistry([
      { id: "4o", name: "gpt-4o" },
      { id: "claude", name: "claude-3-5-sonnet" },
    ]);
    expect(registry.pickDefault("claude")).toBe("claude");
    expect(registry.pickDefault("missing")).toBe("4o");
    expect(registry.pickDefault(null)).toBe("4o");

    registry.replace([]);
    expect(registry.pickDefault("claude")).toBeNull();
  });
});

describe("modelIdToLabel", () => {
  it("shows the id beside a differing name", () => {
    expect(modelIdToLabel({ id: "4o", name: "gpt-4o" })).toBe("gpt-4o (4o)");
    expect(modelIdToLabel({ id: "gpt-4o", name: "gpt-4o" })).toBe("gpt-4o");
  });
});
