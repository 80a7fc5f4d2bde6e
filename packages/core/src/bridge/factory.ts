import type { Logger } from '../logging/logger.js';
import type { BridgeConfig, ProtocolBridge } from '../types/bridge.js';

import type { DuplexChannel } from './channel.js';
import { HttpBridge } from './HttpBridge.js';
import { StdioBridge } from './StdioBridge.js';

export interface CreateBridgeOptions {
  logger?: Logger;

  /** Used by the stdio transport instead of spawning a process. */
  channelFactory?: () => DuplexChannel;

  /** Used by the HTTP transport instead of the global `fetch`. */
  fetch?: typeof fetch;
}

/**
 * Build a fresh, unopened bridge for the configured transport.
 */
export function createBridge(config: BridgeConfig, options: CreateBridgeOptions = {}): ProtocolBridge {
  switch (config.transport) {
    case 'stdio':
      return new StdioBridge(config, {
        logger: options.logger,
        channelFactory: options.channelFactory,
      });
    case 'http':
      return new HttpBridge(config, { logger: options.logger, fetch: options.fetch });
  }
}
