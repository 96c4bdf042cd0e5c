import {
  BaseError,
  DependencyBlockedError,
  TransientClusterError,
} from "./errors";
import {
  DependencyGraph,
  Entity,
  EntityState,
  EntityStatus,
  ReconcileResult,
} from "./types";

const TRANSITIONS: Record<EntityState, readonly EntityState[]> = {
  NotStarted: ["Pending", "Blocked"],
  Pending: ["Pending", "Ready", "Failed", "Blocked"],
  // only while retryable, see `transition`
  Failed: ["Pending", "Failed", "Blocked"],
  Ready: [],
  Blocked: [],
};

export class IllegalTransitionError extends BaseError {
  constructor(name: string, from: EntityState, to: EntityState) {
    super(`illegal state transition for ${name}: ${from} -> ${to}`);
  }
}

/**
 * Per-entity convergence state. The only mutable state shared by a run; each
 * entity is written by one reconcile at a time.
 */
export class StatusMap {
  private readonly statuses = new Map<string, EntityStatus>();

  constructor(entities: readonly Entity[]) {
    for (const entity of entities) {
      this.statuses.set(entity.name, {
        name: entity.name,
        kind: entity.kind,
        state: "NotStarted",
        attempts: 0,
        retryable: false,
      });
    }
  }

  has(name: string): boolean {
    return this.statuses.has(name);
  }

  get(name: string): EntityStatus {
    const status = this.statuses.get(name);
    if (!status) throw new Error(`unknown entity: ${name}`);
    return status;
  }

  state(name: string): EntityState {
    return this.get(name).state;
  }

  private transition(name: string, to: EntityState): EntityStatus {
    const status = this.get(name);
    const allowed =
      TRANSITIONS[status.state].includes(to) &&
      (status.state !== "Failed" || status.retryable);
    if (!allowed) throw new IllegalTransitionError(name, status.state, to);

    status.state = to;
    return status;
  }

  startAttempt(name: string) {
    const status = this.transition(name, "Pending");
    status.attempts++;
    status.retryable = false;
  }

  record(name: string, result: ReconcileResult) {
    switch (result.status) {
      case "Ready": {
        const status = this.transition(name, "Ready");
        status.detail = undefined;
        status.error = undefined;
        break;
      }
      case "Pending": {
        const status = this.transition(name, "Pending");
        status.detail = result.reason;
        status.error = undefined;
        break;
      }
      case "Failed": {
        const status = this.transition(name, "Failed");
        status.retryable = result.error instanceof TransientClusterError;
        status.detail = result.error.message;
        status.error = result.error;
        break;
      }
    }
  }

  block(name: string, blockedBy: string) {
    const status = this.transition(name, "Blocked");
    status.retryable = false;
    status.error = new DependencyBlockedError(name, blockedBy);
    status.detail = status.error.message;
  }

  // retry budget used up without reaching Ready
  exhaust(name: string) {
    const status = this.get(name);
    if (status.state === "Pending") this.transition(name, "Failed");
    else if (status.state !== "Failed")
      throw new IllegalTransitionError(name, status.state, "Failed");

    status.retryable = false;
    status.detail = `retry budget exhausted after ${status.attempts} attempts${
      status.detail ? ` (last: ${status.detail})` : ""
    }`;
  }

  // Ready, Blocked, or Failed without retry left
  isSettled(name: string): boolean {
    const { state, retryable } = this.get(name);
    return (
      state === "Ready" || state === "Blocked" || (state === "Failed" && !retryable)
    );
  }

  // can never become Ready any more
  isDead(name: string): boolean {
    return this.isSettled(name) && this.state(name) !== "Ready";
  }

  allReady(): boolean {
    return this.all().every((status) => status.state === "Ready");
  }

  canProgress(): boolean {
    return this.all().some((status) => !this.isSettled(status.name));
  }

  /**
   * Block every entity (transitively) depending on an entity that can no
   * longer become Ready. `entities` must be in dependency order.
   */
  propagateBlocks(graph: DependencyGraph, entities: readonly Entity[]) {
    for (const entity of entities) {
      if (!this.has(entity.name) || this.isSettled(entity.name)) continue;

      const deadDependency = (graph.dependencies.get(entity.name) || []).find(
        (dep) => this.has(dep) && this.isDead(dep),
      );
      if (deadDependency) this.block(entity.name, deadDependency);
    }
  }

  all(): EntityStatus[] {
    return [...this.statuses.values()];
  }
}
