/**
 * Shared CLI plumbing
 */

import type { Command } from 'commander';
import { Gigasheet } from '../gigasheet.js';

export interface GlobalOptions {
  apiKey?: string;
  debug: boolean;
}

export type ClientFactory = () => Gigasheet;

/**
 * Accumulate a repeatable option into an array
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Build the client lazily from the global options, once per run
 */
export function createClientFactory(program: Command): ClientFactory {
  let client: Gigasheet | null = null;
  return () => {
    if (!client) {
      const { apiKey, debug } = program.opts<GlobalOptions>();
      client = new Gigasheet({ apiKey, debug });
    }
    return client;
  };
}
