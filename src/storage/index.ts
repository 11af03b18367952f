/**
 * Central export for all storage modules
 */

export * from './repositories';
export * from './dynamo-helpers';
export * from './raw-item-db';
export * from './pain-point-db';
export * from './session-db';
export * from './memory-store';

import type { StorageConfig } from '../config';
import { createDocumentClient } from './dynamo-helpers';
import { createMemoryStore } from './memory-store';
import { PainPointTable } from './pain-point-db';
import { RawItemTable } from './raw-item-db';
import type { PipelineStore } from './repositories';
import { ExtractionSessionTable } from './session-db';

/**
 * Factory function to create the configured storage backend
 */
export function createPipelineStore(storage: StorageConfig): PipelineStore {
  switch (storage.driver) {
    case 'memory':
      return createMemoryStore();
    case 'dynamodb': {
      const docClient = createDocumentClient(storage);
      return {
        rawItems: new RawItemTable(docClient, storage.rawItemsTable),
        painPoints: new PainPointTable(docClient, storage.painPointsTable),
        sessions: new ExtractionSessionTable(docClient, storage.sessionsTable),
      };
    }
  }
}
