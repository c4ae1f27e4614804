import { setTimeout as sleep } from 'node:timers/promises';

function gcFunction(): Function | null {
  const gc: unknown = Reflect.get(globalThis, 'gc');
  return typeof gc === 'function' ? gc : null;
}

/** True when the process was started with `--expose-gc` */
export const canCollectGarbage = gcFunction() !== null;

/**
 * Force full collections. Weak references created in the current job stay
 * alive until it ends, so each collection runs on a fresh macrotask.
 */
export async function collectGarbage(rounds = 3): Promise<void> {
  const gc = gcFunction();
  if (!gc) throw new Error('collectGarbage() needs node --expose-gc');

  for (let round = 0; round < rounds; round++) {
    await sleep(0);
    Reflect.apply(gc, undefined, []);
  }
  await sleep(0);
}
