/**
 * Decimal constructor for all FHIRPath arithmetic.
 *
 * decimal.js rounds to 20 significant digits by default; FHIRPath decimals
 * need at least 28, so every decimal in the runtime is built from this
 * clone. The global decimal.js constructor is left untouched.
 */

import { Decimal as DecimalJs } from 'decimal.js';

export const Decimal = DecimalJs.clone({
  precision: 34,
  rounding: DecimalJs.ROUND_HALF_EVEN,
});

export type Decimal = DecimalJs;
