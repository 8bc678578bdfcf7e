import fastify from 'fastify';
import type { FastifyInstance, FastifyReply } from 'fastify';
import fastifyWebsocket from '@fastify/websocket';
import type { WebSocket } from 'ws';
import type { Result } from '../core/result';
import { buildRunConfig, parseRunPlan } from '../config/run-config';
import type { Config } from '../config/validator';
import type { SubscriberQueue } from '../orchestrator/broadcaster';
import type { MeasurementManager } from '../orchestrator/manager';
import type { ProgressEvent } from '../orchestrator/progress-events';
import { silentLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

/**
 * HTTP control plane over a MeasurementManager.
 *
 *  POST /start            run plan body → { run_id }
 *  POST /pause|resume|cancel            → { ok: true }
 *  GET  /status                         → { run_id, state, current_device_index, current_operation, last_event, last_error, summary }
 *  GET  /progress  (WebSocket)          → one JSON ProgressEvent per message
 */
export async function createControlServer(manager: MeasurementManager, config: Config, logger: Logger = silentLogger): Promise<FastifyInstance> {
  const app = fastify({ logger: false });
  await app.register(fastifyWebsocket);

  app.setErrorHandler((error, request, reply) => {
    logger.error('Control request failed', { method: request.method, url: request.url, error: error.message });
    const status = error.statusCode ?? 500;
    void reply.code(status).send({ ok: false, error: error.message });
  });

  app.post('/start', async (request, reply) => {
    const plan = parseRunPlan(request.body);
    if (!plan.ok) {
      return reply.code(400).send({ ok: false, error: plan.error });
    }

    const started = manager.start(buildRunConfig(plan.value, config));
    if (!started.ok) {
      return reply.code(409).send({ ok: false, error: started.error });
    }
    return reply.code(202).send({ run_id: started.value.runId });
  });

  app.post('/pause', async (_request, reply) => sendControl(reply, manager.pause()));
  app.post('/resume', async (_request, reply) => sendControl(reply, manager.resume()));
  app.post('/cancel', async (_request, reply) => sendControl(reply, manager.cancel()));

  app.get('/status', async () => {
    const snapshot = manager.status();
    return {
      run_id: snapshot.runId ?? null,
      state: snapshot.state,
      current_device_index: snapshot.currentDeviceIndex ?? null,
      current_operation: snapshot.currentOperation ?? null,
      last_event: snapshot.lastEvent ?? null,
      last_error: snapshot.lastError ?? null,
      summary: snapshot.summary ?? null,
    };
  });

  app.get('/progress', { websocket: true }, (socket, request) => {
    const subscription = manager.subscribe();
    logger.info('Progress subscriber connected', { ip: request.ip, subscribers: manager.subscriberCount });

    socket.on('close', () => {
      subscription.close();
      logger.info('Progress subscriber disconnected', { subscribers: manager.subscriberCount });
    });

    forwardEvents(subscription, socket).catch((error: unknown) => {
      logger.warn('Progress stream aborted', { error: error instanceof Error ? error.message : String(error) });
      subscription.close();
    });
  });

  return app;
}

function sendControl(reply: FastifyReply, result: Result<void>): FastifyReply {
  if (!result.ok) {
    return reply.code(409).send({ ok: false, error: result.error });
  }
  return reply.send({ ok: true });
}

async function forwardEvents(subscription: SubscriberQueue<ProgressEvent>, socket: WebSocket): Promise<void> {
  for await (const event of subscription) {
    if (socket.readyState !== socket.OPEN) break;
    socket.send(JSON.stringify(event));
  }
}
