import { describe, expect, it, vi } from 'vitest';
import { runFlow } from '../src/flow-runner';
import { buildPrepareFlow } from '../src/sites/prepare.flow';
import { AuthenticationError, BookingSite } from '../src/sites/site';
import { FakePage } from './helpers/fake-page';
import { makeConfig, makeSiteContext, silentLogger } from './helpers/fixtures';

function site(authenticated: boolean, loginResult = true): BookingSite {
  return {
    name: 'fake',
    description: 'Scripted site',
    resource: 'campsite',
    isAuthenticated: vi.fn(async () => authenticated),
    login: vi.fn(async () => loginResult),
    openListing: vi.fn(async () => undefined),
    fetchSlots: vi.fn(async () => []),
    claim: vi.fn(async () => undefined),
    observe: vi.fn(async () => ({ kind: 'confirmed' as const })),
    recover: vi.fn(async () => undefined),
  };
}

describe('prepare flow', () => {
  it('reuses an accepted session', async () => {
    const fake = site(true);
    const onLogin = vi.fn(async () => undefined);
    const page = new FakePage();
    const ctx = makeSiteContext(page);

    const result = await runFlow(buildPrepareFlow(fake, { onLogin }), {
      config: ctx.config,
      logger: silentLogger,
      site: ctx,
    });

    expect(result.stepsCompleted).toBe(3);
    expect(page.actions).toEqual(['navigate https://booking.example.test/teetimes']);
    expect(fake.login).not.toHaveBeenCalled();
    expect(onLogin).not.toHaveBeenCalled();
    expect(fake.openListing).toHaveBeenCalledTimes(1);
  });

  it('logs in and saves the session when needed', async () => {
    const fake = site(false);
    const onLogin = vi.fn(async () => undefined);
    const ctx = makeSiteContext(new FakePage());

    await runFlow(buildPrepareFlow(fake, { onLogin }), { config: ctx.config, logger: silentLogger, site: ctx });

    expect(fake.login).toHaveBeenCalledTimes(1);
    expect(onLogin).toHaveBeenCalledTimes(1);
  });

  it('names the step when credentials are rejected', async () => {
    const fake = site(false, false);
    const ctx = makeSiteContext(new FakePage());
    const run = runFlow(buildPrepareFlow(fake), { config: ctx.config, logger: silentLogger, site: ctx });

    await expect(run).rejects.toThrow(
      'Step "login" of flow "fake-prepare" failed: The fake site rejected the configured credentials.'
    );
    await expect(run).rejects.toMatchObject({ cause: expect.any(AuthenticationError) });
    expect(fake.openListing).not.toHaveBeenCalled();
  });

  it('only describes the steps on a dry run', async () => {
    const fake = site(false);
    const result = await runFlow(
      buildPrepareFlow(fake),
      { config: makeConfig(), logger: silentLogger },
      { dryRun: true }
    );

    expect(result.stepsCompleted).toBe(3);
    expect(fake.isAuthenticated).not.toHaveBeenCalled();
  });

  it('refuses a real run without a page', async () => {
    await expect(
      runFlow(buildPrepareFlow(site(true)), { config: makeConfig(), logger: silentLogger })
    ).rejects.toThrow('FlowContext.site is required for non-dry-run execution.');
  });
});
