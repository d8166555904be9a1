import { getHealth, getLogger, incCounter } from '../context';
import { Service, type ServiceOptions } from '../Service';

export const GREETINGS_COUNTER = 'greetings_total';

/**
 * Example service: greets by name, counts greetings per language, reports an
 * advisory upstream probe and flushes on shutdown.
 */
export function createGreeterService(
  options: Omit<ServiceOptions, 'name'> & { name?: string } = {}
): Service {
  const service = new Service({ ...options, name: options.name ?? 'greeter' });

  service.registerCounter({
    name: GREETINGS_COUNTER,
    help: 'Greetings sent, by language',
    labelNames: ['lang'],
  });

  service.registerHealthCheck({
    name: 'translations',
    timeoutMs: 1_000,
    critical: false,
    check: () => undefined,
  });

  service.route('GET', '/hello/{name}', (req, res) => {
    const lang = typeof req.query.lang === 'string' ? req.query.lang : 'en';
    incCounter(GREETINGS_COUNTER, lang);
    getLogger().info('Greeting sent', { name: req.params.name, lang });
    res.type('text/plain').send(`Hello, ${req.params.name}!`);
  });

  service.route('GET', '/status', async (_req, res) => {
    const health = getHealth();
    const snapshot = health ? await health.evaluate({ timeoutMs: 1_000 }) : undefined;
    res.json({ service: service.name, status: snapshot?.status ?? 'OK' });
  });

  service.addShutdownHook(() => {
    service.logger.info('Flushing greeting buffers');
  }, 'flush-greetings');

  return service;
}
