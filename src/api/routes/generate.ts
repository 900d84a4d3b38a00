import type { FastifyInstance, FastifyReply } from 'fastify';
import type { GenerationService } from '../../service/generationService.js';
import type { Logger } from '../../logging/logger.js';
import type { GenerateStreamResponseMessage } from '../../types/rpc.types.js';
import { Readable } from 'node:stream';
import { generateBodySchema, type ErrorReply, type GenerateReply, type StreamErrorLine } from '../schemas.js';
import { describeFailure, httpStatusFor } from '../httpStatus.js';

function sendFailure(reply: FastifyReply, err: unknown): FastifyReply {
  const { code, message } = describeFailure(err);
  const body: ErrorReply = { error: message };
  return reply.status(httpStatusFor(code)).send(body);
}

async function* encodeLines(
  first: IteratorResult<GenerateStreamResponseMessage, void>,
  messages: AsyncGenerator<GenerateStreamResponseMessage, void, undefined>,
  logger: Logger,
): AsyncGenerator<string, void, undefined> {
  let next = first;
  try {
    while (!next.done) {
      yield `${JSON.stringify(next.value)}\n`;
      next = await messages.next();
    }
  } catch (err) {
    const { code, message } = describeFailure(err);
    logger.debug({ code }, 'Gateway stream aborted after output began');
    const line: StreamErrorLine = { error: message, code };
    yield `${JSON.stringify(line)}\n`;
  } finally {
    await messages.return();
  }
}

export function registerGenerateRoutes(
  app: FastifyInstance,
  service: GenerationService,
  logger: Logger,
): void {
  app.post<{ Reply: GenerateReply | ErrorReply }>('/generate', async (req, reply) => {
    const parsed = generateBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.issues[0]?.message ?? 'invalid body' });
    }

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    try {
      const response = await service.generate(parsed.data, { signal: controller.signal, peer: req.ip });
      return reply.send(response);
    } catch (err) {
      return sendFailure(reply, err);
    }
  });

  app.post('/generate/stream', async (req, reply) => {
    const parsed = generateBodySchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ErrorReply = { error: parsed.error.issues[0]?.message ?? 'invalid body' };
      return reply.status(400).send(body);
    }

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    const messages = service.generateStream(parsed.data, {
      signal: controller.signal,
      peer: req.ip,
    });

    // Pull the first message before committing to a 200 so early failures keep their status.
    let first: IteratorResult<GenerateStreamResponseMessage, void>;
    try {
      first = await messages.next();
    } catch (err) {
      return sendFailure(reply, err);
    }

    return reply
      .type('application/x-ndjson')
      .send(Readable.from(encodeLines(first, messages, logger)));
  });
}
