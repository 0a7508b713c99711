import type { Credential, QuotaHeaders, QuotaState, Sleeper } from "./types";

export type QuotaResource = "core" | "search";

export interface CredentialPoolOptions {
  resource: QuotaResource;
  /** A credential is limited once its remaining quota drops below this. */
  lowWatermark: number;
  /** Nominal per-credential quota restored after a reset. */
  ceiling: number;
  now?: () => number;
}

function parseHeaderNumber(value: string | number | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Quota bookkeeping for a set of tokens against one GitHub rate-limit
 * resource. Every mutation is synchronous, so check-then-update sequences
 * cannot interleave between concurrent workers.
 */
export class CredentialPool {
  readonly resource: QuotaResource;
  private readonly credentials: Credential[];
  private readonly states = new Map<string, QuotaState>();
  private readonly lowWatermark: number;
  private readonly ceiling: number;
  private readonly now: () => number;

  constructor(credentials: Credential[], options: CredentialPoolOptions) {
    this.resource = options.resource;
    this.credentials = [...credentials];
    this.lowWatermark = options.lowWatermark;
    this.ceiling = options.ceiling;
    this.now = options.now ?? Date.now;
    for (const credential of this.credentials) {
      this.states.set(credential.id, { remaining: this.ceiling, resetAt: null, limited: false });
    }
  }

  get size(): number {
    return this.credentials.length;
  }

  list(): readonly Credential[] {
    return this.credentials;
  }

  stateOf(credential: Credential): Readonly<QuotaState> {
    return { ...this.state(credential) };
  }

  acquireUsable(group: readonly Credential[] = this.credentials): Credential | null {
    return group.find((credential) => !this.state(credential).limited) ?? null;
  }

  /** A null `remaining` means the response carried no quota headers; state is left as is. */
  recordResponse(credential: Credential, remaining: number | null, resetAt: Date | null) {
    if (remaining === null) {
      return;
    }
    const state = this.state(credential);
    state.remaining = remaining;
    if (resetAt) {
      state.resetAt = resetAt;
    }
    state.limited = remaining < this.lowWatermark;
  }

  recordHeaders(credential: Credential, headers: QuotaHeaders) {
    const resource = headers["x-ratelimit-resource"];
    if (typeof resource === "string" && resource !== this.resource) {
      return;
    }

    const remaining = parseHeaderNumber(headers["x-ratelimit-remaining"]);
    const reset = parseHeaderNumber(headers["x-ratelimit-reset"]);
    this.recordResponse(credential, remaining, reset === null ? null : new Date(reset * 1000));

    const retryAfter = parseHeaderNumber(headers["retry-after"]);
    if (retryAfter !== null) {
      this.markLimited(credential, new Date(this.now() + retryAfter * 1000));
    }
  }

  markLimited(credential: Credential, resetAt: Date | null) {
    const state = this.state(credential);
    state.limited = true;
    state.remaining = Math.min(state.remaining, 0);
    if (resetAt && (!state.resetAt || resetAt > state.resetAt)) {
      state.resetAt = resetAt;
    }
  }

  allExhausted(): boolean {
    return this.credentials.every((credential) => this.state(credential).limited);
  }

  earliestReset(): Date | null {
    let earliest: Date | null = null;
    for (const credential of this.credentials) {
      const state = this.state(credential);
      if (state.limited && state.resetAt && (!earliest || state.resetAt < earliest)) {
        earliest = state.resetAt;
      }
    }
    return earliest;
  }

  resetAll() {
    for (const credential of this.credentials) {
      this.release(credential);
    }
  }

  /** Releases limited credentials whose reset time has passed or was never reported. */
  releaseExpired() {
    const now = this.now();
    for (const credential of this.credentials) {
      const state = this.state(credential);
      if (state.limited && (!state.resetAt || state.resetAt.getTime() <= now)) {
        this.release(credential);
      }
    }
  }

  totalRemaining(): number {
    return this.credentials.reduce((sum, credential) => sum + this.state(credential).remaining, 0);
  }

  /** Blocks the caller until a limited credential's reset time has passed, then releases it. */
  async waitForReset(credential: Credential, sleeper: Sleeper, marginMs: number) {
    const state = this.state(credential);
    if (!state.limited) {
      return;
    }
    const now = this.now();
    if (state.resetAt && state.resetAt.getTime() > now) {
      const waitMs = state.resetAt.getTime() - now + marginMs;
      console.log(
        `⏸️  [${this.resource}] ${credential.id} limited (${state.remaining} remaining). Waiting ${Math.ceil(
          waitMs / 1000
        )}s until ${state.resetAt.toISOString()}…`
      );
      await sleeper(waitMs);
    }
    this.release(credential);
  }

  private release(credential: Credential) {
    const state = this.state(credential);
    state.limited = false;
    state.remaining = this.ceiling;
    state.resetAt = null;
  }

  private state(credential: Credential): QuotaState {
    const state = this.states.get(credential.id);
    if (!state) {
      throw new Error(`Credential ${credential.id} is not part of the ${this.resource} pool`);
    }
    return state;
  }
}
