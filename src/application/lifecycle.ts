import type { Logger } from 'pino';

export interface StoppableServices {
  readonly pipeline: { flushNotices(): Promise<void> };
  readonly orchestrator: { shutdown(): void };
  readonly transport: { stop(): Promise<void> };
  /** Returned by `registerEventRoutes`. */
  readonly unregisterRoutes: () => Promise<void>;
  readonly log: Logger;
}

/**
 * Stops the orchestration services.
 *
 * Event routes stay registered until the transport has drained, so a
 * `delivery_failed` raised by a notice still in retry, or an inbound
 * envelope already queued, reaches the alert manager.
 */
export async function stopServices(services: StoppableServices): Promise<void> {
  const { pipeline, orchestrator, transport, unregisterRoutes, log } = services;

  await pipeline.flushNotices();
  await transport.stop();
  await unregisterRoutes();
  orchestrator.shutdown();

  log.info('Orchestration services stopped');
}
