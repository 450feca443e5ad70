import type { KeyInput } from "./events.js";
import type { Focus } from "./focus.js";

export type KeyAction =
  | { kind: "quit" }
  | { kind: "cycleFocus" }
  | { kind: "toggleList" }
  | { kind: "startEditing" }
  | { kind: "stopEditing" }
  | { kind: "stopEditingAndCycle" }
  | { kind: "conversationNext" }
  | { kind: "conversationPrevious" }
  | { kind: "conversationOpen" }
  | { kind: "conversationNew" }
  | { kind: "modelNext" }
  | { kind: "modelPrevious" }
  | { kind: "modelReload" }
  | { kind: "messageNext" }
  | { kind: "messagePrevious" }
  | { kind: "messageCopy" }
  | { kind: "submit" }
  | { kind: "insertText"; text: string }
  | { kind: "deleteBackward" }
  | { kind: "none" };

const NONE: KeyAction = { kind: "none" };

/**
 * Maps one key press to the action it triggers in the focused region. Pure so
 * the key surface can be tested without a terminal.
 */
export function resolveKeyAction(focus: Focus, input: string, key: KeyInput): KeyAction {
  if (key.ctrl && input === "c") {
    return { kind: "quit" };
  }

  if (focus.region === "input" && focus.mode === "editing") {
    return resolveEditingKey(input, key);
  }

  if (key.tab) {
    return { kind: "cycleFocus" };
  }
  if (key.ctrl || key.meta) {
    return NONE;
  }

  const down = key.downArrow || input === "j";
  const up = key.upArrow || input === "k";

  switch (input) {
    case "q":
      return { kind: "quit" };
    case "h":
      return { kind: "toggleList" };
    case "i":
      return { kind: "startEditing" };
    default:
      break;
  }

  switch (focus.region) {
    case "conversationList":
      if (down) {
        return { kind: "conversationNext" };
      }
      if (up) {
        return { kind: "conversationPrevious" };
      }
      if (key.return) {
        return { kind: "conversationOpen" };
      }
      if (input === "n") {
        return { kind: "conversationNew" };
      }
      return NONE;
    case "modelSelect":
      if (down) {
        return { kind: "modelNext" };
      }
      if (up) {
        return { kind: "modelPrevious" };
      }
      if (input === "r") {
        return { kind: "modelReload" };
      }
      return NONE;
    case "chat":
      if (down) {
        return { kind: "messageNext" };
      }
      if (up) {
        return { kind: "messagePrevious" };
      }
      if (input === "y") {
        return { kind: "messageCopy" };
      }
      return NONE;
    case "input":
      if (key.return) {
        return { kind: "startEditing" };
      }
      return NONE;
  }
}

function resolveEditingKey(input: string, key: KeyInput): KeyAction {
  if (key.return) {
    return { kind: "submit" };
  }
  if (key.escape) {
    return { kind: "stopEditing" };
  }
  if (key.tab) {
    return { kind: "stopEditingAndCycle" };
  }
  if (key.backspace || key.delete) {
    return { kind: "deleteBackward" };
  }
  if (key.ctrl || key.meta || key.upArrow || key.downArrow) {
    return NONE;
  }
  const text = stripControlCharacters(input);
  return text ? { kind: "insertText", text } : NONE;
}

function stripControlCharacters(input: string): string {
  // pasted newlines become spaces; other control characters are dropped
  return input.replace(/\r\n?|\n/g, " ").replace(/[\u0000-\u001f\u007f]/g, "");
}
