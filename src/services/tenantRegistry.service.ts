import logger from '../config/logger';
import { KeyedLock } from '../common/keyedLock';
import { TransportError } from '../common/errors';
import { withTimeout } from '../common/functions';
import type { ChannelTransport, TransportIdentity } from '../channels/channel.types';

export type TenantState = 'unregistered' | 'starting' | 'running' | 'stopping';

export interface TenantHandle {
  ownerId: number;
  credential: string;
  transport: ChannelTransport;
  identity: TransportIdentity;
  startedAt: Date;
}

export interface TenantRegistryOptions {
  /** Upper bound on a single transport close. */
  closeTimeoutMs: number;
}

/**
 * Live dedicated-bot handles keyed by owner id. Mutations for one owner run
 * one at a time in arrival order; different owners never wait on each other.
 */
export class TenantRegistry {
  private readonly handles = new Map<number, TenantHandle>();
  private readonly states = new Map<number, TenantState>();
  private readonly lock = new KeyedLock();

  constructor(private readonly options: TenantRegistryOptions) {}

  get(ownerId: number): TenantHandle | undefined {
    return this.handles.get(ownerId);
  }

  has(ownerId: number): boolean {
    return this.handles.has(ownerId);
  }

  list(): TenantHandle[] {
    return [...this.handles.values()];
  }

  get size(): number {
    return this.handles.size;
  }

  state(ownerId: number): TenantState {
    return this.states.get(ownerId) ?? 'unregistered';
  }

  /**
   * Stops the current handle, if any, then inserts whatever `start` yields.
   * When `start` throws the owner is left unregistered and the error propagates.
   */
  async replace(ownerId: number, start: () => Promise<TenantHandle>): Promise<TenantHandle> {
    return this.lock.run(this.key(ownerId), async () => {
      await this.stopLocked(ownerId);

      this.states.set(ownerId, 'starting');
      try {
        const handle = await start();
        this.handles.set(ownerId, handle);
        this.states.set(ownerId, 'running');
        return handle;
      } catch (error) {
        this.states.delete(ownerId);
        throw error;
      }
    });
  }

  // No-op when nothing is registered
  async remove(ownerId: number): Promise<boolean> {
    return this.lock.run(this.key(ownerId), () => this.stopLocked(ownerId));
  }

  // Removes the handle only while it still wraps `transport`; a newer registration is left alone
  async evict(ownerId: number, transport: ChannelTransport): Promise<boolean> {
    return this.lock.run(this.key(ownerId), async () => {
      const handle = this.handles.get(ownerId);
      if (!handle || handle.transport !== transport) {
        return false;
      }
      return this.stopLocked(ownerId);
    });
  }

  async closeAll(): Promise<number> {
    const removed = await Promise.all([...this.handles.keys()].map((ownerId) => this.remove(ownerId)));
    return removed.filter(Boolean).length;
  }

  private async stopLocked(ownerId: number): Promise<boolean> {
    const handle = this.handles.get(ownerId);
    if (!handle) {
      return false;
    }

    this.states.set(ownerId, 'stopping');
    try {
      await withTimeout(
        handle.transport.close(),
        this.options.closeTimeoutMs,
        () => new TransportError('Unreachable', `Closing transport for owner ${ownerId} timed out`)
      );
    } catch (error) {
      // the handle goes either way; a stuck close must not pin the owner
      logger.error({ err: error, ownerId }, 'Failed to close tenant transport');
    } finally {
      this.handles.delete(ownerId);
      this.states.delete(ownerId);
    }

    logger.info({ ownerId }, 'Tenant handle removed');
    return true;
  }

  private key(ownerId: number): string {
    return String(ownerId);
  }
}
