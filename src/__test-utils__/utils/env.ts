/**
 * Environment helpers for tests.
 *
 * Env mutation always goes through here so every change is restored.
 */

export type EnvSnapshot = Record<string, string | undefined>;

const applyEnv = (values: EnvSnapshot): void => {
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) {
      // assigning undefined would store the string "undefined"
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
};

/**
 * Capture selected environment variables.
 */
export const snapshotEnv = (keys: readonly string[]): EnvSnapshot =>
  Object.fromEntries(keys.map((key) => [key, process.env[key]]));

/**
 * Restore environment variables from a snapshot.
 */
export const restoreEnv = (snapshot: EnvSnapshot): void => {
  applyEnv(snapshot);
};

/**
 * Apply `updates` (undefined unsets) while `fn` runs, then restore.
 */
export const withEnv = async <T>(
  updates: EnvSnapshot,
  fn: () => Promise<T> | T,
): Promise<T> => {
  const snapshot = snapshotEnv(Object.keys(updates));
  applyEnv(updates);

  try {
    return await fn();
  } finally {
    restoreEnv(snapshot);
  }
};
