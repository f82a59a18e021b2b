/**
 * types.ts — The two site-specific collaborators the pipeline calls.
 *
 *   • ListScanner — turns a list page into DiscoveryTasks.
 *   • Extractor   — reads one detail page the harvester has already opened.
 *
 * Both receive a borrowed SessionHandle and must not keep it after
 * returning.
 */

import type { DiscoveryTask, ExtractedFields } from '../core/types';
import type { SessionHandle } from '../pool/sessionHandle';

export interface Extractor {
  /** Element whose presence means the detail content has rendered. */
  readonly readySelector?: string;
  /**
   * Read fields from a session already showing the task's detail content.
   * Missing optional fields are left undefined; failures throw.
   */
  extract(session: SessionHandle, task: DiscoveryTask): Promise<ExtractedFields>;
}

export interface ListScanner {
  scan(session: SessionHandle, listUrl: string): Promise<DiscoveryTask[]>;
}
