import type { PageAddress } from './address.js';
import type { Page } from './page.js';

/**
 * Builds the page for an address. The tag decides how the router drives it: `sync`
 * producers run inline on blocking lookups and through the dispatch queue on suspending
 * ones; `suspending` producers can only be awaited.
 */
export type Producer<P extends Page = Page> =
  | { readonly kind: 'sync'; produce(address: PageAddress): P }
  | { readonly kind: 'suspending'; produce(address: PageAddress): Promise<P> };

export const syncProducer = <P extends Page>(produce: (address: PageAddress) => P): Producer<P> => ({ kind: 'sync', produce });

export const suspendingProducer = <P extends Page>(produce: (address: PageAddress) => Promise<P>): Producer<P> => ({ kind: 'suspending', produce });
