/**
 * Evaluation datasets
 *
 * Items are deduplicated by content: inserting an item whose input, expected
 * output and metadata match an existing item is a no-op.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import type { Logger } from './logger';
import type { RestClient } from './rest';
import { generateId, isPlainObject } from './tracing';

const INSERT_CHUNK_SIZE = 1000;
const PAGE_SIZE = 100;

export interface DatasetItem {
  id?: string;
  input: unknown;
  expectedOutput?: unknown;
  metadata?: Record<string, unknown>;
}

export interface DatasetItemRecord extends DatasetItem {
  id: string;
}

export interface DatasetRecord {
  id: string;
  name: string;
  description?: string;
}

export const DatasetRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
});

const DatasetItemRecordSchema = z
  .object({
    id: z.string().min(1),
    input: z.unknown(),
    expectedOutput: z.unknown(),
    metadata: z.record(z.unknown()).optional(),
  })
  .transform(({ id, input, expectedOutput, metadata }): DatasetItemRecord => {
    const item: DatasetItemRecord = { id, input };
    if (expectedOutput !== undefined) item.expectedOutput = expectedOutput;
    if (metadata !== undefined) item.metadata = metadata;
    return item;
  });

const DatasetItemPageSchema = z.object({
  content: z.array(DatasetItemRecordSchema).default([]),
  total: z.number().optional(),
});

/**
 * JSON with object keys sorted at every level, so equal content serializes identically
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Content hash of a dataset item. The item id does not take part.
 */
export function contentHash(item: DatasetItem): string {
  const content = canonicalJson({
    input: item.input,
    expectedOutput: item.expectedOutput,
    metadata: item.metadata,
  });
  return createHash('sha256').update(content).digest('hex');
}

export class Dataset {
  readonly id: string;
  readonly name: string;
  readonly description?: string;

  private rest: RestClient;
  private logger: Logger;
  private hashById: Map<string, string> = new Map();
  private idByHash: Map<string, string> = new Map();
  private synced: boolean;

  constructor(record: DatasetRecord, rest: RestClient, logger: Logger, options: { synced?: boolean } = {}) {
    this.id = record.id;
    this.name = record.name;
    this.description = record.description;
    this.rest = rest;
    this.logger = logger;
    this.synced = options.synced ?? false;
  }

  /**
   * Insert items, skipping any whose content is already in the dataset
   */
  async insert(items: DatasetItem[]): Promise<DatasetItemRecord[]> {
    await this.syncHashes();

    const fresh: { record: DatasetItemRecord; hash: string }[] = [];
    const seen = new Set<string>();
    for (const item of items) {
      const hash = contentHash(item);
      if (this.idByHash.has(hash) || seen.has(hash)) {
        this.logger.debug({ dataset: this.name }, 'Skipping duplicate dataset item');
        continue;
      }
      seen.add(hash);
      fresh.push({ record: { ...item, id: item.id ?? generateId() }, hash });
    }

    for (let i = 0; i < fresh.length; i += INSERT_CHUNK_SIZE) {
      const chunk = fresh.slice(i, i + INSERT_CHUNK_SIZE);
      await this.rest.request('PUT', '/v1/private/datasets/items', {
        datasetName: this.name,
        items: chunk.map(({ record }) => record),
      });
      for (const { record, hash } of chunk) {
        this.remember(record.id, hash);
      }
    }

    this.logger.debug({ dataset: this.name, inserted: fresh.length, skipped: items.length - fresh.length }, 'Inserted items');
    return fresh.map(({ record }) => record);
  }

  /**
   * Replace the content of existing items
   */
  async update(items: DatasetItemRecord[]): Promise<void> {
    if (items.length === 0) return;
    await this.syncHashes();

    await this.rest.request('PUT', '/v1/private/datasets/items', { datasetName: this.name, items });
    for (const item of items) {
      this.forget(item.id);
      this.remember(item.id, contentHash(item));
    }
  }

  async delete(itemIds: string[]): Promise<void> {
    if (itemIds.length === 0) return;

    await this.rest.request('POST', '/v1/private/datasets/items/delete', { itemIds });
    for (const id of itemIds) {
      this.forget(id);
    }
  }

  async clear(): Promise<void> {
    const items = await this.getItems();
    await this.delete(items.map((item) => item.id));
  }

  /**
   * Fetch items page by page, stopping once `nbSamples` are collected
   */
  async getItems(nbSamples?: number): Promise<DatasetItemRecord[]> {
    const items: DatasetItemRecord[] = [];

    for (let page = 1; ; page++) {
      const response = await this.rest.requestJson(
        'GET',
        `/v1/private/datasets/${encodeURIComponent(this.id)}/items?page=${page}&size=${PAGE_SIZE}`,
        DatasetItemPageSchema
      );
      const content = response?.content ?? [];
      items.push(...content);

      if (nbSamples !== undefined && items.length >= nbSamples) {
        return items.slice(0, nbSamples);
      }
      if (content.length < PAGE_SIZE) {
        return items;
      }
    }
  }

  private async syncHashes(): Promise<void> {
    if (this.synced) return;

    const items = await this.getItems();
    for (const item of items) {
      this.remember(item.id, contentHash(item));
    }
    this.synced = true;
  }

  private remember(id: string, hash: string): void {
    this.hashById.set(id, hash);
    this.idByHash.set(hash, id);
  }

  private forget(id: string): void {
    const hash = this.hashById.get(id);
    if (hash === undefined) return;
    this.hashById.delete(id);
    if (this.idByHash.get(hash) === id) this.idByHash.delete(hash);
  }
}
