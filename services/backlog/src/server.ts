import Fastify, { type FastifyServerOptions } from 'fastify';
import formbody from '@fastify/formbody';
import { registerWebhookRoutes } from './routes/webhook';
import type { RecordStore } from './contracts/recordStore';

export interface AppOptions {
  store: RecordStore;
  token: string;
  webhookPath?: string;
  slashCommand?: string;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(opts: AppOptions) {
  const app = Fastify({ logger: opts.logger ?? false });
  await app.register(formbody);
  // bodies of any other type carry no form fields; the token check then answers 400
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, _body, done) => done(null, {}));

  app.get('/health', async (req) => {
    try {
      opts.store.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      req.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  await registerWebhookRoutes(app, {
    store: opts.store,
    token: opts.token,
    path: opts.webhookPath,
    slashCommand: opts.slashCommand,
  });
  return app;
}
