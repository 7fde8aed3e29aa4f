import type { RestClient } from './rest';
import { generateId } from './tracing';

export interface ExperimentItem {
  datasetItemId: string;
  traceId: string;
}

export interface ExperimentRecord {
  id: string;
  name: string;
  datasetName: string;
  metadata?: Record<string, unknown>;
}

/**
 * One evaluation run of a task over a dataset. Items link dataset items to the traces they produced.
 */
export class Experiment {
  readonly id: string;
  readonly name: string;
  readonly datasetName: string;

  private rest: RestClient;

  constructor(record: ExperimentRecord, rest: RestClient) {
    this.id = record.id;
    this.name = record.name;
    this.datasetName = record.datasetName;
    this.rest = rest;
  }

  async insert(items: ExperimentItem[]): Promise<void> {
    if (items.length === 0) return;

    await this.rest.request('POST', '/v1/private/experiments/items', {
      experimentItems: items.map((item) => ({
        id: generateId(),
        experimentId: this.id,
        datasetItemId: item.datasetItemId,
        traceId: item.traceId,
      })),
    });
  }
}
