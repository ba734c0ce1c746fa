import { CriticalVenueError, UnknownVenueError } from '../../errors/trading-errors.js';
import type { VenueId } from '../../venues/venue.types.js';
import type { OrderTranslator } from '../interfaces/order-translator.interface.js';
import type { ConnectionManager, ConnectionStatus } from './connection-manager.js';

export interface VenueBinding {
  venueId: VenueId;
  manager: ConnectionManager;
  translator: OrderTranslator;
}

/**
 * One ConnectionManager and translator per venue for the process lifetime.
 */
export class VenueRegistry {
  private readonly bindings = new Map<VenueId, VenueBinding>();

  register(manager: ConnectionManager, translator: OrderTranslator): void {
    const venueId = manager.venueId;
    if (translator.venueId !== venueId) {
      throw new CriticalVenueError(
        `Translator for ${translator.venueId} cannot serve venue ${venueId}`,
        { venueId }
      );
    }
    if (this.bindings.has(venueId)) {
      throw new CriticalVenueError(`A connection manager for ${venueId} is already registered`, {
        venueId,
      });
    }
    this.bindings.set(venueId, { venueId, manager, translator });
  }

  get(venueId: VenueId): VenueBinding {
    const binding = this.bindings.get(venueId);
    if (!binding) {
      throw new UnknownVenueError(venueId);
    }
    return binding;
  }

  has(venueId: VenueId): boolean {
    return this.bindings.has(venueId);
  }

  venueIds(): VenueId[] {
    return [...this.bindings.keys()];
  }

  statuses(): ConnectionStatus[] {
    return [...this.bindings.values()].map(binding => binding.manager.getStatus());
  }

  async connectAll(): Promise<PromiseSettledResult<void>[]> {
    return Promise.allSettled([...this.bindings.values()].map(binding => binding.manager.connect()));
  }

  async disconnectAll(): Promise<void> {
    await Promise.all([...this.bindings.values()].map(binding => binding.manager.disconnect()));
  }
}
