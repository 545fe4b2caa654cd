/**
 * Tests unitarios para src/engines/ConcurrencyCoordinator.ts
 *
 * Backend en memoria y espera de backoff inyectada (sin dormir).
 */
import { ERROR_CODES, ERROR_MESSAGES } from '../../shared/constants/errors';
import {
  clampConcurrency,
  ConcurrencyCoordinator,
  type CoordinatorEvent,
  type CoordinatorOptions,
} from '../../src/engines/ConcurrencyCoordinator';
import { RetryExecutor, type SleepFn } from '../../src/engines/RetryExecutor';
import { createItem } from '../../src/engines/SessionModel';
import { ItemStatus, type DownloadItem } from '../../src/engines/types';
import {
  delay,
  FakeBackend,
  indexOfUrl,
  waitForAbort,
  type FakeBackendOptions,
} from '../helpers/fakeBackend';
import { makeFormat } from '../helpers/fixtures';

function makeItems(count: number): DownloadItem[] {
  return Array.from({ length: count }, (_, i) =>
    createItem(`https://example.com/v/${i + 1}`, i + 1, `Vídeo ${i + 1}`)
  );
}

interface Harness {
  coordinator: ConcurrencyCoordinator;
  backend: FakeBackend;
  events: CoordinatorEvent[];
  controller: AbortController;
  sleep: jest.Mock<ReturnType<SleepFn>, Parameters<SleepFn>>;
}

function createHarness(
  backendOptions: FakeBackendOptions,
  options: Partial<Pick<CoordinatorOptions, 'concurrency' | 'itemTimeoutMs'>> = {}
): Harness {
  const backend = new FakeBackend(backendOptions);
  const events: CoordinatorEvent[] = [];
  const controller = new AbortController();
  const sleep = jest.fn<ReturnType<SleepFn>, Parameters<SleepFn>>().mockResolvedValue(undefined);
  const coordinator = new ConcurrencyCoordinator({
    backend,
    downloadOptions: { format: makeFormat(), downloadDir: '/tmp/descargas' },
    signal: controller.signal,
    report: event => events.push(event),
    executor: new RetryExecutor({ sleep }),
    ...options,
  });
  return { coordinator, backend, events, controller, sleep };
}

describe('ConcurrencyCoordinator', () => {
  describe('clampConcurrency', () => {
    it('debe acotar a 1-10 y usar 3 si no es un número', () => {
      expect(clampConcurrency(0)).toBe(1);
      expect(clampConcurrency(25)).toBe(10);
      expect(clampConcurrency(4.7)).toBe(4);
      expect(clampConcurrency(Number.NaN)).toBe(3);
    });
  });

  describe('secuencial', () => {
    it('debe procesar en orden y seguir tras un fallo permanente', async () => {
      const { coordinator, backend } = createHarness(
        {
          download: async url => {
            if (indexOfUrl(url) === 3) throw new Error('ERROR: Private video');
            return { filePath: `/tmp/${indexOfUrl(url)}.mp3` };
          },
        },
        { concurrency: 1 }
      );
      const items = makeItems(5);

      const result = await coordinator.run(items);

      expect(result).toEqual({ completed: 4, failed: 1, cancelled: 0, notStarted: 0 });
      expect(backend.downloadCalls.map(indexOfUrl)).toEqual([1, 2, 3, 4, 5]);
      expect(items[2].status).toBe(ItemStatus.FAILED);
      expect(items[2].errorMessage).toBe('ERROR: Private video');
      expect(items[2].retryCount).toBe(1);
      expect(items[0].filePath).toBe('/tmp/1.mp3');
    });

    it('debe reintentar un error transitorio y completar el ítem', async () => {
      let calls = 0;
      const { coordinator, events, sleep } = createHarness(
        {
          download: async () => {
            calls++;
            if (calls < 3) throw new Error('Connection reset by peer');
            return {};
          },
        },
        { concurrency: 1 }
      );
      const items = makeItems(1);

      const result = await coordinator.run(items);

      expect(result.completed).toBe(1);
      expect(items[0].retryCount).toBe(2);
      expect(items[0].status).toBe(ItemStatus.COMPLETED);
      expect(sleep.mock.calls.map(call => call[0])).toEqual([2000, 4000]);
      expect(events.map(event => event.type)).toEqual([
        'itemStarted',
        'itemRetrying',
        'itemRetrying',
        'itemCompleted',
      ]);
    });

    it('debe reenviar el progreso del backend', async () => {
      const { coordinator, events } = createHarness(
        {
          download: async (_url, _options, onProgress) => {
            onProgress({ phase: 'downloading', downloadedBytes: 10, totalBytes: 100 });
            return {};
          },
        },
        { concurrency: 1 }
      );

      await coordinator.run(makeItems(1));

      const progress = events.find(event => event.type === 'itemProgress');
      expect(progress?.type === 'itemProgress' && progress.progress.downloadedBytes).toBe(10);
    });
  });

  describe('concurrente', () => {
    it('no debe superar el número de workers configurado', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      const { coordinator, backend } = createHarness(
        {
          download: async () => {
            inFlight++;
            maxInFlight = Math.max(maxInFlight, inFlight);
            await delay(5);
            inFlight--;
            return {};
          },
        },
        { concurrency: 3 }
      );

      const result = await coordinator.run(makeItems(7));

      expect(result.completed).toBe(7);
      expect(maxInFlight).toBe(3);
      expect(backend.downloadCalls).toHaveLength(7);
    });

    it('debe arrancar los ítems en orden de índice', async () => {
      const { coordinator, events } = createHarness(
        {
          download: async url => {
            await delay(indexOfUrl(url) === 1 ? 20 : 1);
            return {};
          },
        },
        { concurrency: 2 }
      );

      await coordinator.run(makeItems(4).reverse());

      const started = events.filter(event => event.type === 'itemStarted');
      expect(started.map(event => event.item.index)).toEqual([1, 2, 3, 4]);
    });

    it('un ítem que supera el plazo debe fallar con TIMEOUT sin frenar al resto', async () => {
      let hungSignal: AbortSignal | undefined;
      const { coordinator, events } = createHarness(
        {
          download: async (url, options) => {
            if (indexOfUrl(url) === 2) {
              hungSignal = options.signal;
              return waitForAbort(options.signal);
            }
            return {};
          },
        },
        { concurrency: 2, itemTimeoutMs: 30 }
      );
      const items = makeItems(3);

      const result = await coordinator.run(items);

      expect(result).toEqual({ completed: 2, failed: 1, cancelled: 0, notStarted: 0 });
      expect(items[1].status).toBe(ItemStatus.FAILED);
      expect(items[1].errorMessage).toBe(ERROR_MESSAGES.TIMEOUT);
      expect(hungSignal?.aborted).toBe(true);
      const failed = events.find(event => event.type === 'itemFailed');
      expect(failed?.type === 'itemFailed' && failed.error.code).toBe(ERROR_CODES.TIMEOUT);
    });
  });

  describe('cancelación', () => {
    it('debe cancelar el ítem en curso y no arrancar los de la cola', async () => {
      let cancel: () => void = () => {};
      const { coordinator, controller, backend } = createHarness(
        {
          download: async (url, options) => {
            if (indexOfUrl(url) === 3) {
              cancel();
              return waitForAbort(options.signal);
            }
            return {};
          },
        },
        { concurrency: 1 }
      );
      cancel = () => controller.abort();
      const items = makeItems(10);

      const result = await coordinator.run(items);

      expect(result).toEqual({ completed: 2, failed: 0, cancelled: 1, notStarted: 7 });
      expect(items[2].status).toBe(ItemStatus.CANCELLED);
      expect(items[3].status).toBe(ItemStatus.PENDING);
      expect(backend.downloadCalls).toHaveLength(3);
    });

    it('con la señal ya abortada no debe arrancar nada', async () => {
      const { coordinator, controller, backend } = createHarness({}, { concurrency: 3 });
      controller.abort();

      const result = await coordinator.run(makeItems(4));

      expect(result).toEqual({ completed: 0, failed: 0, cancelled: 0, notStarted: 4 });
      expect(backend.downloadCalls).toHaveLength(0);
    });

    it('en paralelo debe cancelar todos los ítems en vuelo', async () => {
      const { coordinator, controller } = createHarness(
        { download: async (_url, options) => waitForAbort(options.signal) },
        { concurrency: 2 }
      );
      const items = makeItems(5);

      const running = coordinator.run(items);
      await delay(5);
      controller.abort();
      const result = await running;

      expect(result).toEqual({ completed: 0, failed: 0, cancelled: 2, notStarted: 3 });
      expect(items.slice(0, 2).map(item => item.status)).toEqual([
        ItemStatus.CANCELLED,
        ItemStatus.CANCELLED,
      ]);
    });
  });

  describe('consumidor de eventos', () => {
    it('un consumidor que lanza no debe cortar a los workers', async () => {
      const backend = new FakeBackend({
        download: async url => {
          await delay(indexOfUrl(url) === 1 ? 10 : 1);
          return {};
        },
      });
      const seen: string[] = [];
      const coordinator = new ConcurrencyCoordinator({
        backend,
        downloadOptions: { format: makeFormat(), downloadDir: '/tmp/descargas' },
        signal: new AbortController().signal,
        concurrency: 2,
        executor: new RetryExecutor({ sleep: async () => {} }),
        report: event => {
          seen.push(`${event.type}:${event.item.index}`);
          if (event.type === 'itemStarted') throw new Error('fallo del consumidor');
        },
      });
      const items = makeItems(3);

      const result = await coordinator.run(items);

      expect(result).toEqual({ completed: 3, failed: 0, cancelled: 0, notStarted: 0 });
      expect(items.map(item => item.status)).toEqual([
        ItemStatus.COMPLETED,
        ItemStatus.COMPLETED,
        ItemStatus.COMPLETED,
      ]);
      expect(seen.filter(entry => entry.startsWith('itemCompleted'))).toHaveLength(3);
    });
  });
});
