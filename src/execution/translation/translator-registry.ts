import { UnknownVenueError } from '../../errors/trading-errors.js';
import type { InstrumentCatalog } from '../../config/instruments.js';
import type { VenueId } from '../../venues/venue.types.js';
import type { OrderTranslator } from '../interfaces/order-translator.interface.js';
import { Mt5OrderTranslator } from './mt5.translator.js';
import { OkxOrderTranslator } from './okx.translator.js';

/**
 * Translator lookup by venue id. Built-in venues are created from the
 * instrument catalog; others can be added with register().
 */
export class TranslatorRegistry {
  private readonly translators = new Map<VenueId, OrderTranslator>();

  static withBuiltins(catalog: InstrumentCatalog): TranslatorRegistry {
    const registry = new TranslatorRegistry();
    registry.register(new OkxOrderTranslator(catalog));
    registry.register(new Mt5OrderTranslator(catalog));
    return registry;
  }

  register(translator: OrderTranslator): void {
    this.translators.set(translator.venueId, translator);
  }

  get(venueId: VenueId): OrderTranslator {
    const translator = this.translators.get(venueId);
    if (!translator) {
      throw new UnknownVenueError(venueId);
    }
    return translator;
  }
}
