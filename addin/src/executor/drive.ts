/**
 * Drive a cooperative event pump until a condition holds.
 *
 * Every iteration awaits `pump()` before re-checking, so the loop never spins
 * without handing control to the host. There is no timeout: a host that never
 * completes keeps the caller waiting, and the remote client's own timeout is
 * what surfaces it.
 */
export async function driveUntil(params: {
  done: () => boolean;
  pump: () => Promise<void>;
}): Promise<number> {
  let iterations = 0;
  while (!params.done()) {
    await params.pump();
    iterations++;
  }
  return iterations;
}
