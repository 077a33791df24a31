import type { Logger } from 'pino';
import type { OutpostClient } from '../clients/outpost-client';
import type { ExportEnvelope, InventoryItem } from '../types/inventory.types';
import type {
     MergeStrategy,
     SyncImportMode,
     SyncItemError,
     SyncItemOperation,
     SyncOutcome,
     SyncResult,
     SyncState,
     SyncStatistics,
} from '../types/sync.types';
import {
     AuthenticationError,
     FatalError,
     NotFoundError,
     OutpostError,
     SyncCancelledError,
     TransientError,
     ValidationError,
     errorMessage,
} from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { indexByKey, itemKey, planItem } from './merge-planner';
import type { SyncAuditLog } from './sync-audit-log';

export type SyncStateListener = (state: SyncState, previous: SyncState) => void;

export interface SyncRunOptions {
     requestId?: string;
     signal?: AbortSignal;
     onStateChange?: SyncStateListener;
}

export interface SyncRequest extends SyncRunOptions {
     source: OutpostClient;
     target: OutpostClient;
     strategy: MergeStrategy;
}

export interface SyncOrchestratorOptions {
     auditLog?: SyncAuditLog;
     /** `per_item` ignores a target's bulk import endpoint. */
     mode?: 'auto' | 'per_item';
     now?: () => Date;
     logger?: Logger;
}

const TRANSITIONS: Record<SyncState, readonly SyncState[]> = {
     idle: ['exporting', 'importing'],
     exporting: ['importing', 'failed'],
     importing: ['completed', 'failed'],
     completed: [],
     failed: [],
};

class SyncStateMachine {
     private current: SyncState = 'idle';

     constructor(private readonly listener?: SyncStateListener) {}

     transition(next: SyncState): void {
          if (!TRANSITIONS[this.current].includes(next)) {
               throw new FatalError(`Illegal sync state transition ${this.current} -> ${next}`);
          }
          const previous = this.current;
          this.current = next;
          this.listener?.(next, previous);
     }
}

class StatisticsAccumulator {
     added = 0;
     updated = 0;
     skipped = 0;
     deleted = 0;
     readonly errors: SyncItemError[] = [];

     recordFailure(
          item: Pick<InventoryItem, 'name' | 'category'>,
          operation: SyncItemOperation,
          error: unknown
     ): void {
          this.errors.push({
               itemName: item.name,
               category: item.category,
               operation,
               kind: error instanceof OutpostError ? error.category : 'unknown',
               message: errorMessage(error),
          });
     }

     recordRejection(item: Pick<InventoryItem, 'name' | 'category'>, reason: string): void {
          this.errors.push({
               itemName: item.name,
               category: item.category,
               operation: 'merge',
               kind: 'validation',
               message: reason,
          });
     }

     freeze(strategy: MergeStrategy, startedAt: Date, completedAt: Date): SyncStatistics {
          return Object.freeze({
               itemsAdded: this.added,
               itemsUpdated: this.updated,
               itemsSkipped: this.skipped,
               itemsFailed: this.errors.length,
               itemsDeleted: this.deleted,
               strategyUsed: strategy,
               startedAt,
               completedAt,
               errors: Object.freeze(this.errors.map((error) => Object.freeze({ ...error }))),
          });
     }
}

/** Errors that stop the remaining items instead of being counted per item. */
function abortsBatch(error: unknown): boolean {
     return error instanceof AuthenticationError || error instanceof SyncCancelledError;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
     if (signal?.aborted) {
          throw new SyncCancelledError();
     }
}

export function exportFailureOutcome(error: unknown): SyncOutcome {
     if (error instanceof AuthenticationError) return 'auth_failure';
     if (error instanceof SyncCancelledError) return 'cancelled';
     if (error instanceof TransientError) return 'unreachable_source';
     if (error instanceof ValidationError || error instanceof FatalError) return 'malformed_envelope';
     return 'failed';
}

export function importFailureOutcome(error: unknown): SyncOutcome {
     if (error instanceof AuthenticationError) return 'auth_failure';
     if (error instanceof SyncCancelledError) return 'cancelled';
     if (error instanceof TransientError) return 'unreachable_target';
     return 'failed';
}

/**
 * Moves one node's exported inventory onto another node with a merge
 * strategy. Per-item failures are counted and the batch continues; only a
 * failed export, an unreachable target, an authentication failure or a
 * cancellation end the run as `failed`.
 */
export class SyncOrchestrator {
     private readonly auditLog?: SyncAuditLog;
     private readonly mode: 'auto' | 'per_item';
     private readonly now: () => Date;
     private readonly log: Logger;

     constructor(options: SyncOrchestratorOptions = {}) {
          this.auditLog = options.auditLog;
          this.mode = options.mode ?? 'auto';
          this.now = options.now ?? (() => new Date());
          this.log = options.logger ?? createChildLogger({ component: 'sync-orchestrator' });
     }

     async sync(request: SyncRequest): Promise<SyncResult> {
          const { source, target, strategy, requestId, signal } = request;
          const machine = new SyncStateMachine(request.onStateChange);
          const startedAt = this.now();
          const log = this.log.child({ source: source.nodeName, target: target.nodeName, strategy, requestId });

          let envelope: ExportEnvelope;
          machine.transition('exporting');
          try {
               throwIfAborted(signal);
               envelope = await source.exportInventory({ signal });
               log.info({ itemCount: envelope.items.length }, 'Source inventory exported');
          } catch (error) {
               machine.transition('failed');
               log.error({ err: error }, 'Export failed');
               return this.finish(
                    {
                         state: 'failed',
                         outcome: exportFailureOutcome(error),
                         sourceNode: source.nodeName,
                         targetNode: target.nodeName,
                         statistics: new StatisticsAccumulator().freeze(strategy, startedAt, this.now()),
                         error: errorMessage(error),
                         requestId,
                    },
                    log
               );
          }

          return this.runImport(machine, envelope, target, strategy, startedAt, { requestId, signal }, log);
     }

     /** Imports an envelope that was exported earlier, skipping the export step. */
     async importEnvelope(
          envelope: ExportEnvelope,
          target: OutpostClient,
          strategy: MergeStrategy,
          options: SyncRunOptions = {}
     ): Promise<SyncResult> {
          const machine = new SyncStateMachine(options.onStateChange);
          const log = this.log.child({
               source: envelope.sourceNode,
               target: target.nodeName,
               strategy,
               requestId: options.requestId,
          });
          return this.runImport(machine, envelope, target, strategy, this.now(), options, log);
     }

     private async runImport(
          machine: SyncStateMachine,
          envelope: ExportEnvelope,
          target: OutpostClient,
          strategy: MergeStrategy,
          startedAt: Date,
          options: SyncRunOptions,
          log: Logger
     ): Promise<SyncResult> {
          const { requestId, signal } = options;
          const stats = new StatisticsAccumulator();
          let mode: SyncImportMode | undefined;
          let remote: SyncStatistics | undefined;

          machine.transition('importing');
          try {
               throwIfAborted(signal);
               mode = this.mode === 'per_item' || !(await target.supportsBulkImport({ signal })) ? 'per_item' : 'bulk';
               if (mode === 'bulk') {
                    remote = await target.importInventory(envelope, strategy, { signal });
               } else {
                    await this.importPerItem(envelope, target, strategy, stats, signal);
               }
          } catch (error) {
               machine.transition('failed');
               log.error({ err: error, mode }, 'Import failed');
               return this.finish(
                    {
                         state: 'failed',
                         outcome: importFailureOutcome(error),
                         sourceNode: envelope.sourceNode,
                         targetNode: target.nodeName,
                         mode,
                         statistics: stats.freeze(strategy, startedAt, this.now()),
                         error: errorMessage(error),
                         requestId,
                    },
                    log
               );
          }

          machine.transition('completed');
          const statistics = remote
               ? Object.freeze({ ...remote, startedAt, completedAt: this.now() })
               : stats.freeze(strategy, startedAt, this.now());
          return this.finish(
               {
                    state: 'completed',
                    outcome: statistics.itemsFailed > 0 ? 'partial_success' : 'success',
                    sourceNode: envelope.sourceNode,
                    targetNode: target.nodeName,
                    mode,
                    statistics,
                    requestId,
               },
               log
          );
     }

     /**
      * One call per envelope item, strictly in envelope order. Listing the
      * target is the only step whose failure fails the run outright.
      */
     private async importPerItem(
          envelope: ExportEnvelope,
          target: OutpostClient,
          strategy: MergeStrategy,
          stats: StatisticsAccumulator,
          signal: AbortSignal | undefined
     ): Promise<void> {
          const existing = await target.listInventory(undefined, { signal });
          let index = indexByKey(existing);

          if (strategy === 'replace') {
               const survivors: InventoryItem[] = [];
               for (const item of existing) {
                    throwIfAborted(signal);
                    try {
                         await target.deleteInventoryItem(item.itemId, { signal });
                         stats.deleted++;
                    } catch (error) {
                         if (error instanceof NotFoundError) {
                              // already gone
                              stats.deleted++;
                              continue;
                         }
                         if (abortsBatch(error)) {
                              throw error;
                         }
                         stats.recordFailure(item, 'delete', error);
                         survivors.push(item);
                    }
               }
               index = indexByKey(survivors);
          }

          for (const incoming of envelope.items) {
               throwIfAborted(signal);
               const key = itemKey(incoming);
               const action = planItem(strategy, incoming, index.get(key));

               switch (action.type) {
                    case 'skip':
                         stats.skipped++;
                         continue;
                    case 'reject':
                         stats.recordRejection(incoming, action.reason);
                         continue;
                    case 'create':
                         try {
                              const created = await target.createInventoryItem(action.input, { signal });
                              // replace keeps envelope duplicates as separate items
                              if (strategy !== 'replace') {
                                   index.set(key, created);
                              }
                              stats.added++;
                         } catch (error) {
                              if (abortsBatch(error)) {
                                   throw error;
                              }
                              stats.recordFailure(incoming, 'create', error);
                         }
                         continue;
                    case 'update':
                         try {
                              const updated = await target.updateInventoryItem(action.itemId, action.patch, { signal });
                              if (strategy === 'replace') {
                                   index.delete(key);
                              } else {
                                   index.set(key, updated);
                              }
                              stats.updated++;
                         } catch (error) {
                              if (abortsBatch(error)) {
                                   throw error;
                              }
                              stats.recordFailure(incoming, strategy === 'merge' ? 'merge' : 'update', error);
                         }
                         continue;
               }
          }
     }

     private async finish(result: SyncResult, log: Logger): Promise<SyncResult> {
          const frozen = Object.freeze(result);
          const summary = {
               outcome: frozen.outcome,
               mode: frozen.mode,
               itemsAdded: frozen.statistics.itemsAdded,
               itemsUpdated: frozen.statistics.itemsUpdated,
               itemsSkipped: frozen.statistics.itemsSkipped,
               itemsFailed: frozen.statistics.itemsFailed,
               itemsDeleted: frozen.statistics.itemsDeleted,
          };
          if (frozen.outcome === 'partial_success') {
               log.warn(summary, 'Sync completed with errors');
          } else if (frozen.state === 'completed') {
               log.info(summary, 'Sync completed');
          }

          if (this.auditLog) {
               await this.auditLog.append({
                    requestId: frozen.requestId,
                    sourceNode: frozen.sourceNode,
                    targetNode: frozen.targetNode,
                    strategy: frozen.statistics.strategyUsed,
                    outcome: frozen.outcome,
                    statistics: frozen.statistics,
                    error: frozen.error,
               });
          }
          return frozen;
     }
}
