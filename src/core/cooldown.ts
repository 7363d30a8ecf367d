import { sleep, type SleepFn } from "./retry";

export function jitteredDelay(baseMs: number, jitterRatio = 0.5): number {
  const jitter = Math.random() * baseMs * jitterRatio;
  return baseMs + jitter;
}

export async function applyCooldown(baseMs: number, sleepFn: SleepFn = sleep): Promise<void> {
  if (baseMs <= 0) return;
  await sleepFn(jitteredDelay(baseMs));
}
