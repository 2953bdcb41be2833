import type { OpName, RuleKind } from "./ops";

export type TraceEvent =
  | {
      type: "alloc";
      id: number;
      op: OpName;
      parents: number[];
    }
  | {
      type: "backward_begin";
      root: number;
      nodes: number;
    }
  | {
      type: "backward_node";
      id: number;
      op: OpName;
      rule: RuleKind | null;
    }
  | {
      type: "backward_end";
      root: number;
    }
  | {
      type: "zero_grad";
      id: number;
    }
  | {
      type: "gradient_step";
      id: number;
      lr: number;
    }
  | {
      type: "rewind";
      mark: number;
      released: number;
    }
  | {
      type: "poison";
      reason: string;
    };

export class TraceRecorder {
  private readonly events: TraceEvent[] = [];

  record(event: TraceEvent): void {
    this.events.push(event);
  }

  snapshot(): TraceEvent[] {
    return this.events.slice();
  }

  clear(): void {
    this.events.length = 0;
  }
}
