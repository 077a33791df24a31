import { randomUUID } from 'crypto';
import type { OutpostRegistry } from '../clients/outpost-registry';
import type { MergeStrategy, SyncResult } from '../types/sync.types';
import { ValidationError } from '../utils/errors';
import type { SyncOrchestrator, SyncStateListener } from './sync-orchestrator';

export interface RunSyncInput {
     source: string;
     target: string;
     strategy: MergeStrategy;
     requestId?: string;
     signal?: AbortSignal;
     onStateChange?: SyncStateListener;
}

/** Resolves node names through the registry and runs the orchestrator. */
export class SyncService {
     constructor(
          private readonly registry: OutpostRegistry,
          private readonly orchestrator: SyncOrchestrator
     ) {}

     /** Throws NotFoundError for unknown nodes, ValidationError when source equals target. */
     validatePair(source: string, target: string): void {
          if (source === target) {
               throw new ValidationError('source and target must be different outposts', 'target');
          }
          this.registry.get(source);
          this.registry.get(target);
     }

     async runSync(input: RunSyncInput): Promise<SyncResult> {
          this.validatePair(input.source, input.target);
          return this.orchestrator.sync({
               source: this.registry.get(input.source),
               target: this.registry.get(input.target),
               strategy: input.strategy,
               requestId: input.requestId ?? randomUUID(),
               signal: input.signal,
               onStateChange: input.onStateChange,
          });
     }
}
