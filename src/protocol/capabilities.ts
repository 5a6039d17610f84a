/**
 * Server capabilities advertised during initialize
 */

import type { ServerCapabilities } from './lifecycle.js';

/**
 * The dice server offers tools and log forwarding. The tool set is fixed
 * after startup, so no list-changed notifications are sent.
 */
export function getDefaultServerCapabilities(): ServerCapabilities {
  return {
    tools: {
      listChanged: false,
    },
    logging: {},
  };
}
