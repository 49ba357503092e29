import bchaddr from 'bchaddrjs';
import { err, ok, type Result } from 'neverthrow';

import { toError } from '../utils/type-guard-utils.js';

const CASHADDR_PREFIX = 'bitcoincash';

/**
 * Maps an address to the canonical form under which it is stored and looked
 * up. This is the only place deciding address identity:
 * - ETH addresses are lowercased,
 * - BCH addresses in CashAddr form (`bitcoincash:...`) become legacy Base58,
 * - everything else passes through unchanged.
 *
 * A malformed CashAddr yields the conversion library's error unchanged.
 */
export function normalizeAddress(currency: string, address: string): Result<string, Error> {
  const code = currency.toUpperCase();

  if (code === 'BCH' && address.startsWith(CASHADDR_PREFIX)) {
    try {
      return ok(bchaddr.toLegacyAddress(address));
    } catch (error) {
      return err(toError(error));
    }
  }

  if (code === 'ETH') {
    return ok(address.toLowerCase());
  }

  return ok(address);
}
