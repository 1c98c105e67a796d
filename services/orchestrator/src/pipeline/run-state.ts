import type { Logger } from "@nestjs/common";

export type MediaState = "Received" | "Fetching" | "Decoding" | "Inferring" | "Normalizing" | "Completed" | "Failed";
export type TextState = "Received" | "Fetching" | "Summarizing" | "Completed" | "Failed";

type Transitions<S extends string> = Readonly<Record<S, readonly S[]>>;

export const MEDIA_TRANSITIONS: Transitions<MediaState> = {
  Received: ["Fetching", "Failed"],
  Fetching: ["Decoding", "Failed"],
  Decoding: ["Inferring", "Failed"],
  Inferring: ["Normalizing", "Failed"],
  Normalizing: ["Completed", "Failed"],
  Completed: [],
  Failed: [],
};

/** Plain text skips `Fetching`; text objects pass through it. */
export const TEXT_TRANSITIONS: Transitions<TextState> = {
  Received: ["Fetching", "Summarizing", "Failed"],
  Fetching: ["Summarizing", "Failed"],
  Summarizing: ["Completed", "Failed"],
  Completed: [],
  Failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/** Per-request state tracker; one instance never outlives its request. */
export class PipelineRun<S extends string> {
  private current: S;
  private readonly visited: S[];
  private readonly startedAt = performance.now();

  constructor(
    readonly id: string,
    private readonly transitions: Transitions<S>,
    initial: S,
    private readonly failedState: S,
    private readonly logger?: Logger,
  ) {
    this.current = initial;
    this.visited = [initial];
  }

  get state(): S {
    return this.current;
  }

  get history(): readonly S[] {
    return this.visited;
  }

  get elapsedMs(): number {
    return Math.round(performance.now() - this.startedAt);
  }

  get finished(): boolean {
    return this.transitions[this.current].length === 0;
  }

  enter(next: S): void {
    if (!this.transitions[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.logger?.debug(`[${this.id}] ${this.current} -> ${next}`);
    this.current = next;
    this.visited.push(next);
  }

  /** Moves to the failure state unless the run already ended. */
  fail(): void {
    if (this.transitions[this.current].includes(this.failedState)) {
      this.enter(this.failedState);
    }
  }
}
