import { timingSafeEqual } from 'crypto';
import { STATUS_CODES } from 'http';
import type { FastifyInstance, FastifyReply, FastifyRequest, HTTPMethods } from 'fastify';
import { z } from 'zod';
import { CommandDispatcher } from '../commands/dispatcher';
import { parseCommand } from '../commands/parse';
import type { RecordStore } from '../contracts/recordStore';

// ---------- Schemas ----------
// urlencoded bodies decode repeated fields to arrays; the first value wins
const formSchema = z.record(z.union([z.string(), z.array(z.string())]));

// anything but POST (and the GET cert check) is answered with 405
const WEBHOOK_METHODS: HTTPMethods[] = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

export interface WebhookOptions {
  store: RecordStore;
  token: string;
  path?: string;
  slashCommand?: string;
}

// ---------- Helpers ----------
function formValue(source: unknown, key: string): string {
  const parsed = formSchema.safeParse(source ?? {});
  if (!parsed.success) return '';
  const value = parsed.data[key];
  if (Array.isArray(value)) return value[0] ?? '';
  return value ?? '';
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** The platform probes the endpoint's certificate with a bare GET. */
function isCertCheck(req: FastifyRequest): boolean {
  return (
    req.method === 'GET' &&
    (formValue(req.query, 'ssl_check') === '1' || formValue(req.body, 'ssl_check') === '1')
  );
}

function abort(reply: FastifyReply, code: number) {
  return reply
    .code(code)
    .type('text/plain; charset=utf-8')
    .send(STATUS_CODES[code] ?? '');
}

// ---------- Routes ----------
export async function registerWebhookRoutes(app: FastifyInstance, opts: WebhookOptions) {
  const dispatcher = new CommandDispatcher({ store: opts.store, slashCommand: opts.slashCommand });

  app.route({
    method: WEBHOOK_METHODS,
    url: opts.path ?? '/',
    handler: async (req, reply) => {
      if (isCertCheck(req)) return reply.code(200).send();
      if (req.method !== 'POST') return abort(reply, 405);
      if (!tokensMatch(formValue(req.body, 'token'), opts.token)) return abort(reply, 400);

      try {
        const command = parseCommand(formValue(req.body, 'text'));
        const message = dispatcher.execute(command);
        if (!message) return reply.code(200).send();

        req.log.info({ command: command.kind }, 'Command handled');
        return reply.code(200).type('application/json; charset=utf-8').send(message);
      } catch (err) {
        req.log.error({ err }, 'Command failed');
        return abort(reply, 500);
      }
    },
  });
}
