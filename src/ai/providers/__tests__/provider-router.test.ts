import { describe, expect, test } from '@jest/globals';
import { ProviderRouter } from '../provider-router.js';
import { CompletionOptions, ProviderClient, ProviderEndpoint, ProviderError } from '../types.js';

interface RecordedCall {
  prompt: string;
  modelId: string;
  options: CompletionOptions;
}

type Behavior = (prompt: string, options: CompletionOptions) => Promise<string>;

class FakeProviderClient implements ProviderClient {
  readonly calls: RecordedCall[] = [];
  readonly endpoint: ProviderEndpoint;

  constructor(
    name: string,
    private readonly probe: Behavior,
    private readonly answer: Behavior
  ) {
    this.endpoint = {
      name,
      baseUrl: `http://${name}.local/v1`,
      apiKey: 'test-secret',
      models: { code: `${name}-code`, rules: `${name}-rules` },
    };
  }

  async complete(prompt: string, modelId: string, options: CompletionOptions = {}): Promise<string> {
    this.calls.push({ prompt, modelId, options });
    return options.maxTokens === 1 ? this.probe(prompt, options) : this.answer(prompt, options);
  }

  get generationCalls(): RecordedCall[] {
    return this.calls.filter((call) => call.options.maxTokens !== 1);
  }
}

const ok = (text: string): Behavior => async () => text;
const fail = (reason: ProviderError['reason']): Behavior => async () => {
  throw new ProviderError(`failed with ${reason}`, { reason });
};

function createRouter(primary: FakeProviderClient, fallback: FakeProviderClient) {
  return new ProviderRouter({ primary, fallback, probeTimeoutMs: 100, requestTimeoutMs: 1000 });
}

describe('ProviderRouter', () => {
  describe('isPrimaryAvailable', () => {
    test('should send a one-token probe with the probe timeout', async () => {
      const primary = new FakeProviderClient('primary', ok('ok'), ok('code'));
      const router = createRouter(primary, new FakeProviderClient('fallback', ok('ok'), ok('code')));

      await expect(router.isPrimaryAvailable()).resolves.toBe(true);
      expect(primary.calls[0].modelId).toBe('primary-code');
      expect(primary.calls[0].options.timeoutMs).toBe(100);
      expect(primary.calls[0].options.maxTokens).toBe(1);
    });

    test('should report unavailable instead of throwing', async () => {
      const primary = new FakeProviderClient('primary', fail('network'), ok('code'));
      const router = createRouter(primary, new FakeProviderClient('fallback', ok('ok'), ok('code')));

      await expect(router.isPrimaryAvailable()).resolves.toBe(false);
    });
  });

  describe('generate', () => {
    test('should use the primary when it is available', async () => {
      const primary = new FakeProviderClient('primary', ok('ok'), ok('primary program'));
      const fallback = new FakeProviderClient('fallback', ok('ok'), ok('fallback program'));
      const router = createRouter(primary, fallback);

      await expect(router.generate('Write a game', 'code')).resolves.toEqual({
        text: 'primary program',
        providerUsed: 'PRIMARY',
      });
      expect(primary.generationCalls[0].options.timeoutMs).toBe(1000);
      expect(fallback.calls).toHaveLength(0);
    });

    test('should pick the model for the role', async () => {
      const primary = new FakeProviderClient('primary', ok('ok'), ok('rules text'));
      const router = createRouter(primary, new FakeProviderClient('fallback', ok('ok'), ok('x')));

      await router.generate('Invent rules', 'rules');
      expect(primary.generationCalls[0].modelId).toBe('primary-rules');
    });

    test('should go straight to the fallback when the probe fails', async () => {
      const primary = new FakeProviderClient('primary', fail('timeout'), ok('primary program'));
      const fallback = new FakeProviderClient('fallback', ok('ok'), ok('fallback program'));
      const router = createRouter(primary, fallback);

      await expect(router.generate('Write a game', 'code')).resolves.toEqual({
        text: 'fallback program',
        providerUsed: 'FALLBACK',
      });
      expect(primary.generationCalls).toHaveLength(0);
      expect(fallback.generationCalls[0].modelId).toBe('fallback-code');
    });

    test('should fall back when the primary fails after a good probe', async () => {
      const primary = new FakeProviderClient('primary', ok('ok'), fail('malformed'));
      const fallback = new FakeProviderClient('fallback', ok('ok'), ok('fallback program'));
      const router = createRouter(primary, fallback);

      const result = await router.generate('Write a game', 'code');

      expect(result.providerUsed).toBe('FALLBACK');
      expect(primary.generationCalls).toHaveLength(1);
    });

    test('should probe the primary again on every call', async () => {
      let primaryUp = false;
      const primary = new FakeProviderClient(
        'primary',
        async () => {
          if (!primaryUp) throw new ProviderError('down', { reason: 'network' });
          return 'ok';
        },
        ok('primary program')
      );
      const router = createRouter(primary, new FakeProviderClient('fallback', ok('ok'), ok('fallback program')));

      expect((await router.generate('p', 'code')).providerUsed).toBe('FALLBACK');
      primaryUp = true;
      expect((await router.generate('p', 'code')).providerUsed).toBe('PRIMARY');
    });

    test('should list every failure when all providers fail', async () => {
      const primary = new FakeProviderClient('primary', ok('ok'), fail('empty'));
      const fallback = new FakeProviderClient('fallback', ok('ok'), fail('auth'));
      const router = createRouter(primary, fallback);

      const error = await router.generate('p', 'code').then(
        () => undefined,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(ProviderError);
      if (!(error instanceof ProviderError)) return;
      expect(error.message).toBe('All providers failed: failed with empty; failed with auth');
      expect(error.reason).toBe('auth');
      expect(error.causes.map((cause) => cause.reason)).toEqual(['empty', 'auth']);
    });

    test('should not fall back after an abort', async () => {
      const primary = new FakeProviderClient('primary', ok('ok'), fail('aborted'));
      const fallback = new FakeProviderClient('fallback', ok('ok'), ok('fallback program'));
      const router = createRouter(primary, fallback);

      await expect(router.generate('p', 'code')).rejects.toThrow('failed with aborted');
      expect(fallback.calls).toHaveLength(0);
    });

    test('should wrap unexpected errors from a client', async () => {
      const primary = new FakeProviderClient('primary', fail('network'), ok('x'));
      const fallback = new FakeProviderClient('fallback', ok('ok'), async () => {
        throw new Error('socket hang up');
      });
      const router = createRouter(primary, fallback);

      await expect(router.generate('p', 'code')).rejects.toThrow(
        'All providers failed: fallback request failed: socket hang up'
      );
    });
  });
});
