export type TransferState =
  | "VALIDATING"
  | "MATERIALIZING"
  | "BALANCING"
  | "FINALIZING"
  | "DONE"
  | "FAILED";

const NEXT_STATE: Record<TransferState, TransferState | null> = {
  VALIDATING: "MATERIALIZING",
  MATERIALIZING: "BALANCING",
  BALANCING: "FINALIZING",
  FINALIZING: "DONE",
  DONE: null,
  FAILED: null,
};

export function isTerminal(state: TransferState): boolean {
  return state === "DONE" || state === "FAILED";
}

export class TransferStateMachine {
  private current: TransferState = "VALIDATING";
  private readonly history: TransferState[] = ["VALIDATING"];

  get state(): TransferState {
    return this.current;
  }

  get transitions(): readonly TransferState[] {
    return this.history;
  }

  advance(): TransferState {
    const next = NEXT_STATE[this.current];
    if (next === null) {
      throw new Error(`Cannot advance transfer from terminal state ${this.current}`);
    }
    return this.moveTo(next);
  }

  fail(): TransferState {
    if (isTerminal(this.current)) {
      throw new Error(`Cannot fail transfer from terminal state ${this.current}`);
    }
    return this.moveTo("FAILED");
  }

  private moveTo(next: TransferState): TransferState {
    this.current = next;
    this.history.push(next);
    return next;
  }
}
