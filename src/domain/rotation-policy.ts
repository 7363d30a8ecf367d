import type { Account } from "../db/schema";
import type { ErrorKind } from "../core/errors";
import { NoAccountAvailableError } from "../core/errors";
import type { AccountStore } from "./engine-contracts";
import type { FailureClass } from "./retry-policy";
import { validateTransition, type RotationPhase } from "./rotation-state-machine";

export interface RotationConfig {
  rotationThreshold: number;
  maxConsecutiveFailures: number;
  authFailuresBeforeDisqualify: number;
}

export interface RotationState {
  readonly phase: RotationPhase;
  readonly activeAccountId: string | null;
  /** Most recently selected account; anchors round-robin after the active one is dropped. */
  readonly lastAccountId: string | null;
  readonly successesSinceRotation: number;
  readonly consecutiveFailures: number;
  readonly forceRotation: boolean;
  readonly disqualified: readonly string[];
  readonly authFailures: Readonly<Record<string, number>>;
}

export interface RotationFailure {
  errorClass: FailureClass;
  errorKind: ErrorKind;
}

export type RotationSelection =
  | { ok: true; account: Account; state: RotationState }
  | { ok: false; error: NoAccountAvailableError; state: RotationState };

export function initialRotationState(): RotationState {
  return {
    phase: "no_active_account",
    activeAccountId: null,
    lastAccountId: null,
    successesSinceRotation: 0,
    consecutiveFailures: 0,
    forceRotation: false,
    disqualified: [],
    authFailures: {},
  };
}

function transition(state: RotationState, to: RotationPhase, patch: Partial<RotationState>): RotationState {
  validateTransition(state.phase, to);
  return { ...state, ...patch, phase: to };
}

function pickNext(candidates: Account[], previousId: string | null): Account | null {
  const [first] = candidates;
  if (!first) return null;
  if (previousId === null) return first;
  return candidates.find((account) => account.id > previousId) ?? first;
}

export async function selectAccount(
  store: Pick<AccountStore, "listUsable">,
  state: RotationState,
  now: Date,
  config: RotationConfig
): Promise<RotationSelection> {
  const usable = await store.listUsable(now);
  const candidates = usable.filter((account) => !state.disqualified.includes(account.id));

  const sticky =
    state.phase === "active" &&
    !state.forceRotation &&
    state.successesSinceRotation < config.rotationThreshold;

  if (sticky) {
    const current = candidates.find((account) => account.id === state.activeAccountId);
    if (current) {
      return { ok: true, account: current, state: transition(state, "active", {}) };
    }
  }

  const next = pickNext(candidates, state.lastAccountId);
  const reset = { successesSinceRotation: 0, consecutiveFailures: 0, forceRotation: false };

  if (!next) {
    return {
      ok: false,
      error: new NoAccountAvailableError(),
      state: transition(state, "exhausted", { ...reset, activeAccountId: null }),
    };
  }

  return {
    ok: true,
    account: next,
    state: transition(state, "active", { ...reset, activeAccountId: next.id, lastAccountId: next.id }),
  };
}

export function onSuccess(state: RotationState): RotationState {
  return {
    ...state,
    successesSinceRotation: state.successesSinceRotation + 1,
    consecutiveFailures: 0,
  };
}

function disqualify(state: RotationState, accountId: string): RotationState {
  return transition(state, "no_active_account", {
    activeAccountId: null,
    disqualified: state.disqualified.includes(accountId) ? state.disqualified : [...state.disqualified, accountId],
    successesSinceRotation: 0,
    consecutiveFailures: 0,
    forceRotation: false,
  });
}

export function onFailure(state: RotationState, failure: RotationFailure, config: RotationConfig): RotationState {
  const consecutiveFailures = state.consecutiveFailures + 1;
  const next: RotationState = {
    ...state,
    consecutiveFailures,
    forceRotation: state.forceRotation || consecutiveFailures >= config.maxConsecutiveFailures,
  };

  const accountId = state.activeAccountId;
  if (accountId === null) return next;

  if (failure.errorClass === "account_locked" || failure.errorClass === "quota_exhausted") {
    return disqualify(next, accountId);
  }

  if (failure.errorClass === "auth_failure") {
    const count = (state.authFailures[accountId] ?? 0) + 1;
    const counted: RotationState = {
      ...next,
      forceRotation: true,
      authFailures: { ...state.authFailures, [accountId]: count },
    };
    return count >= config.authFailuresBeforeDisqualify ? disqualify(counted, accountId) : counted;
  }

  return next;
}
