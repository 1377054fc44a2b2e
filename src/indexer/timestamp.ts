/**
 * generatedAt resolution
 */

// Largest timestamp a Date can hold, in seconds
const MAX_EPOCH_SECONDS = 8.64e12;

/**
 * ISO timestamp for an artifact. SOURCE_DATE_EPOCH (seconds) pins it for
 * reproducible builds.
 */
export function resolveGeneratedAt(
  env: NodeJS.ProcessEnv = process.env,
  now: () => Date = () => new Date()
): string {
  const epoch = env.SOURCE_DATE_EPOCH?.trim();
  if (epoch && /^\d+$/.test(epoch)) {
    const seconds = Number(epoch);
    if (seconds > MAX_EPOCH_SECONDS) {
      throw new Error(`Invalid SOURCE_DATE_EPOCH: ${epoch} is out of range (max ${MAX_EPOCH_SECONDS})`);
    }
    return new Date(seconds * 1000).toISOString();
  }
  return now().toISOString();
}

export type Clock = () => string | null;

export function createClock(enabled: boolean, now?: () => Date): Clock {
  return enabled ? () => resolveGeneratedAt(process.env, now) : () => null;
}
