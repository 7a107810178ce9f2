/**
 * Positional formatting under one invariant convention
 */

export { formatComposite, readFormatItem, type FormatItem } from "./composite.js";
export { formatValue } from "./invariant.js";
export { formatNumber } from "./numeric.js";
export { formatDate } from "./datetime.js";
