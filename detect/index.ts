/**
 * Detector registry
 */

import type { RedactorConfig } from "../config/schema.js";
import type { Detector } from "../engine/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { createAccountIdDetector } from "./account-ids.js";
import { createAddressDetector } from "./address.js";
import { createAliasDetector } from "./aliases.js";
import { createDateGenericDetector, createDobDetector } from "./dates.js";
import { createEmailDetector } from "./email.js";
import { createNerDetector } from "./ner.js";
import { createBankOrgDetector, createOrgDetector } from "./org.js";
import { createPersonDetector } from "./person.js";
import { createPhoneDetector } from "./phone.js";

export { mergeAddressLines, ADDRESS_MERGE_SOURCE, ADDRESS_SOURCE } from "./address.js";
export { scorePersonName } from "./person.js";
export { findHeadingRanges, guardSpans } from "./guards.js";

/**
 * The detectors for one configuration, in run order. The NER detector is
 * appended only when enabled; building it may throw when it is required and
 * wink cannot load.
 */
export function buildDetectors(config: RedactorConfig, logger: Logger = silentLogger): readonly Detector[] {
  const dates = createDateGenericDetector();
  const detectors: Detector[] = [
    createEmailDetector(),
    createPhoneDetector(),
    createAccountIdDetector({ generic: config.detectors.account_ids.generic }),
    createAddressDetector(),
    dates,
    createDobDetector(dates),
    createPersonDetector(),
    createOrgDetector(),
    createBankOrgDetector(),
    createAliasDetector(),
  ];
  if (config.detectors.ner.enabled) {
    detectors.push(createNerDetector({ required: config.detectors.ner.required, logger }));
  }
  logger.debug?.(`detectors: ${detectors.map((d) => d.name()).join(", ")}`);
  return Object.freeze(detectors);
}
