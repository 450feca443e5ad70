export type RemoteCommand =
  | { kind: "new" }
  | { kind: "send"; text: string }
  | { kind: "model"; modelId: string }
  | { kind: "status" };

export type ParsedRemoteLine = RemoteCommand | { kind: "ignored"; line: string; reason: string };

export function parseRemoteCommand(rawLine: string): ParsedRemoteLine {
  const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
  const trimmed = line.trim();
  if (!trimmed) {
    return ignored(line, "empty line");
  }

  const spaceIndex = trimmed.search(/\s/);
  const verb = spaceIndex < 0 ? trimmed : trimmed.slice(0, spaceIndex);
  const rest = spaceIndex < 0 ? "" : trimmed.slice(spaceIndex + 1).trim();

  switch (verb) {
    case "NEW":
      return rest ? ignored(line, "NEW takes no arguments") : { kind: "new" };
    case "STATUS":
      return rest ? ignored(line, "STATUS takes no arguments") : { kind: "status" };
    case "SEND":
      return rest ? { kind: "send", text: rest } : ignored(line, "SEND requires text");
    case "MODEL":
      if (!rest) {
        return ignored(line, "MODEL requires a model id");
      }
      if (/\s/.test(rest)) {
        return ignored(line, "MODEL takes a single model id");
      }
      return { kind: "model", modelId: rest };
    default:
      return ignored(line, `unknown command: ${verb}`);
  }
}

export function formatRemoteCommand(command: RemoteCommand): string {
  switch (command.kind) {
    case "new":
      return "NEW";
    case "status":
      return "STATUS";
    case "send":
      return `SEND ${command.text}`;
    case "model":
      return `MODEL ${command.modelId}`;
  }
}

function ignored(line: string, reason: string): ParsedRemoteLine {
  return { kind: "ignored", line, reason };
}
