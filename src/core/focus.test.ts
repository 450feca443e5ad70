import { describe, expect, it } from "vitest";
import { describeFocus, FocusMachine } from "./focus.js";

describe("FocusMachine", () => {
  it("starts on the conversation list", () => {
    expect(new FocusMachine().focus).toEqual({ region: "conversationList" });
  });

  it("cycles list, chat, input, model select and back", () => {
    const machine = new FocusMachine();
    const visited = [machine.cycle(), machine.cycle(), machine.cycle(), machine.cycle()].map(
      (focus) => focus.region,
    );
    expect(visited).toEqual(["chat", "input", "modelSelect", "conversationList"]);
  });

  it("leaves editing when cycling away from the input", () => {
    const machine = new FocusMachine();
    machine.focusInput("editing");
    expect(machine.cycle()).toEqual({ region: "modelSelect" });
    machine.cycle();
    machine.cycle();
    expect(machine.cycle()).toEqual({ region: "input", mode: "normal" });
  });

  it("exits edit mode only while editing", () => {
    const machine = new FocusMachine();
    expect(machine.exitEdit()).toBe(false);

    machine.focusInput("editing");
    expect(describeFocus(machine.focus)).toBe("input:editing");
    expect(machine.exitEdit()).toBe(true);
    expect(machine.focus).toEqual({ region: "input", mode: "normal" });
    expect(machine.exitEdit()).toBe(false);
  });

  it("moves focus off the side pane when it is hidden", () => {
    const machine = new FocusMachine();
    expect(machine.toggleList()).toBe(false);
    expect(machine.focus).toEqual({ region: "chat" });
  });

  it("skips hidden regions without changing the cycle order", () => {
    const machine = new FocusMachine();
    machine.focusRegion("chat");
    machine.toggleList();

    expect(machine.cycle().region).toBe("input");
    expect(machine.cycle().region).toBe("chat");

    machine.toggleList();
    expect(machine.cycle().region).toBe("input");
    expect(machine.cycle().region).toBe("modelSelect");
  });

  it("keeps focus when the side pane is hidden from another region", () => {
    const machine = new FocusMachine();
    machine.focusInput("editing");
    machine.toggleList();
    expect(machine.focus).toEqual({ region: "input", mode: "editing" });
    expect(machine.listVisible).toBe(false);
  });
});
