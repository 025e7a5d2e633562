import { describe, expect, it, vi } from 'vitest';

/**
 * Tests for `help.ts` helpers (`showHelp` / `showVersion`).
 */
describe('help.ts', () => {
  it('re-exports showHelp from formatter', async () => {
    const helpMod = await import('./help.ts');
    const formatterMod = await import('./formatter.ts');

    expect(helpMod.showHelp).toBe(formatterMod.showHelp);
  });

  it('builds showVersion from getPackageVersion', async () => {
    vi.resetModules();
    vi.doMock('../version/version.ts', () => ({
      getPackageVersion: () => '9.9.9',
    }));

    try {
      const { showVersion } = await import('./help.ts');
      expect(showVersion()).toBe('spindle v9.9.9');
    } finally {
      vi.doUnmock('../version/version.ts');
      vi.resetModules();
    }
  });

  it('reads the real package manifest', async () => {
    const { showVersion } = await import('./help.ts');

    expect(showVersion()).toMatch(/^spindle v\d+\.\d+\.\d+$/);
  });
});
