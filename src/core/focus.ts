export type FocusRegion = "conversationList" | "modelSelect" | "chat" | "input";

export type InputMode = "normal" | "editing";

export type Focus =
  | { region: "conversationList" }
  | { region: "modelSelect" }
  | { region: "chat" }
  | { region: "input"; mode: InputMode };

export const FOCUS_CYCLE: readonly FocusRegion[] = ["conversationList", "chat", "input", "modelSelect"];

const SIDE_PANE_REGIONS = new Set<FocusRegion>(["conversationList", "modelSelect"]);

export function focusFor(region: FocusRegion, mode: InputMode = "normal"): Focus {
  return region === "input" ? { region, mode } : { region };
}

export function isEditing(focus: Focus): boolean {
  return focus.region === "input" && focus.mode === "editing";
}

export function describeFocus(focus: Focus): string {
  return focus.region === "input" && focus.mode === "editing" ? "input:editing" : focus.region;
}

/**
 * Which pane receives keys. The side pane (conversation list and model
 * selector) can be hidden; hidden regions are skipped by the cycle but the
 * cycle order itself never changes.
 */
export class FocusMachine {
  private current: Focus = { region: "conversationList" };
  private sidePaneVisible = true;

  get focus(): Focus {
    return this.current;
  }

  get listVisible(): boolean {
    return this.sidePaneVisible;
  }

  cycle(): Focus {
    this.current = focusFor(this.nextVisible(this.current.region));
    return this.current;
  }

  toggleList(): boolean {
    this.sidePaneVisible = !this.sidePaneVisible;
    if (!this.sidePaneVisible && SIDE_PANE_REGIONS.has(this.current.region)) {
      this.current = focusFor(this.nextVisible(this.current.region));
    }
    return this.sidePaneVisible;
  }

  focusRegion(region: FocusRegion): Focus {
    if (!this.sidePaneVisible && SIDE_PANE_REGIONS.has(region)) {
      this.sidePaneVisible = true;
    }
    this.current = focusFor(region);
    return this.current;
  }

  focusInput(mode: InputMode): Focus {
    this.current = { region: "input", mode };
    return this.current;
  }

  exitEdit(): boolean {
    if (!isEditing(this.current)) {
      return false;
    }
    this.current = { region: "input", mode: "normal" };
    return true;
  }

  private nextVisible(from: FocusRegion): FocusRegion {
    const start = FOCUS_CYCLE.indexOf(from);
    for (let step = 1; step <= FOCUS_CYCLE.length; step += 1) {
      const candidate = FOCUS_CYCLE[(start + step) % FOCUS_CYCLE.length];
      if (candidate && (this.sidePaneVisible || !SIDE_PANE_REGIONS.has(candidate))) {
        return candidate;
      }
    }
    return from;
  }
}
