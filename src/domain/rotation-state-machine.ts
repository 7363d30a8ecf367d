export type RotationPhase = "no_active_account" | "active" | "exhausted";

export const ALLOWED_TRANSITIONS: ReadonlyMap<RotationPhase, RotationPhase[]> = new Map([
  ["no_active_account", ["active", "exhausted"]],
  ["active", ["active", "no_active_account", "exhausted"]],
  ["exhausted", ["active", "exhausted"]],
]);

export function canTransition(from: RotationPhase, to: RotationPhase): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

export function validateTransition(from: RotationPhase, to: RotationPhase): void {
  if (!canTransition(from, to)) {
    throw new Error(
      `Invalid rotation state transition: ${from} -> ${to}. Allowed: ${ALLOWED_TRANSITIONS.get(from)?.join(", ") ?? "none"}`
    );
  }
}
