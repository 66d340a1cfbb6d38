import type { Filter } from "../types.js";
import { blacklistFilter } from "./blacklist.js";
import { bridgeMetadataFilter } from "./bridgeMetadata.js";
import { htmlSanitizerFilter } from "./htmlSanitizer.js";
import { piiRedactorFilter } from "./piiRedactor.js";
import { responseSizeFilter } from "./responseSize.js";
import { secretMaskingFilter } from "./secretMasking.js";

export { blacklistFilter, bridgeMetadataFilter, htmlSanitizerFilter, piiRedactorFilter, responseSizeFilter, secretMaskingFilter };

/** Built-in filters in pipeline order. */
export function createBuiltinFilters(): Filter[] {
  return [
    blacklistFilter,
    htmlSanitizerFilter,
    piiRedactorFilter,
    secretMaskingFilter,
    responseSizeFilter,
    bridgeMetadataFilter,
  ];
}
