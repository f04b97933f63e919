/**
 * Adapter factory: builds the adapter a source's configuration names
 */

import { ConfigError } from '../types.js';
import { SourceHttpClient } from '../http/client.js';
import type { SourceConfig } from '../config/index.js';
import { DepCafoAdapter } from './dep_cafo.js';
import { CsvFileAdapter } from './csv_file.js';
import type { Clock, SourceAdapter } from './types.js';

export interface CreateAdapterOptions {
  client?: SourceHttpClient;
  now?: Clock;
  /** Replaces the configured path of a file-based source */
  file?: string;
}

export function createAdapter(
  sourceId: string,
  source: SourceConfig,
  options: CreateAdapterOptions = {}
): SourceAdapter {
  const adapter = source.adapter;
  if (!adapter) {
    throw new ConfigError(`Source '${sourceId}' has no adapter configured`);
  }

  switch (adapter.kind) {
    case 'dep_cafo_csv':
      return new DepCafoAdapter(sourceId, {
        url: adapter.url,
        client: options.client ?? new SourceHttpClient({ timeoutMs: adapter.timeout_ms }),
        now: options.now,
      });
    case 'manual_csv':
    case 'property_csv':
      return new CsvFileAdapter(sourceId, {
        kind: adapter.kind,
        path: options.file ?? adapter.path,
        now: options.now,
      });
  }
}

export type { SourceAdapter } from './types.js';
