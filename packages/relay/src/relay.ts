// Relay - Wires the message bus, connection registry and transport server together

import type { RelayConfig } from './config.js';
import type { Logger } from './logger.js';
import { MessageBus } from './message-bus.js';
import { ConnectionRegistry } from './connection-registry.js';
import { TransportServer } from './transport-server.js';

export class Relay {
  readonly bus: MessageBus;
  readonly registry: ConnectionRegistry;
  readonly server: TransportServer;
  private logger?: Logger;

  constructor(config: RelayConfig, logger?: Logger) {
    this.logger = logger;
    this.bus = new MessageBus({
      fragmentSize: config.store.fragmentSize,
      maxFragments: config.store.maxFragments,
      logger,
    });
    this.registry = new ConnectionRegistry(this.bus, config.transport, logger);
    this.server = new TransportServer({ config, bus: this.bus, registry: this.registry, logger });
  }

  async start(): Promise<void> {
    await this.server.start();
    this.registry.startSweeping();
    this.logger?.info('[relay] Relay started');
  }

  async stop(): Promise<void> {
    this.logger?.info('[relay] Shutting down...');
    this.registry.stopSweeping();
    await this.server.stop();
    this.logger?.info('[relay] Relay stopped');
  }
}
