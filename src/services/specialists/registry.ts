/**
 * Specialist Registry
 *
 * Capability-tagged set of specialists. Selection is validated against the
 * closed tag enum before dispatch.
 */

import { createLogger } from '../logging/index.js';
import { SPECIALIST_TAGS, type SpecialistTag } from '../../types/specialist.js';
import type { Specialist } from './types.js';

const logger = createLogger({ module: 'specialist-registry' });

export class SpecialistRegistry {
  private readonly specialists = new Map<SpecialistTag, Specialist>();

  register(specialist: Specialist): void {
    if (this.specialists.has(specialist.tag)) {
      logger.warn({ tag: specialist.tag }, 'Replacing registered specialist');
    }
    this.specialists.set(specialist.tag, specialist);
  }

  get(tag: SpecialistTag): Specialist | undefined {
    return this.specialists.get(tag);
  }

  has(tag: SpecialistTag): boolean {
    return this.specialists.has(tag);
  }

  list(): SpecialistTag[] {
    return SPECIALIST_TAGS.filter((tag) => this.specialists.has(tag));
  }

  /**
   * Resolve tags to registered specialists, in canonical tag order and without duplicates.
   * Unregistered tags are skipped.
   */
  select(tags: readonly SpecialistTag[]): Specialist[] {
    const wanted = new Set(tags);
    const selected: Specialist[] = [];
    for (const tag of SPECIALIST_TAGS) {
      if (!wanted.has(tag)) continue;
      const specialist = this.specialists.get(tag);
      if (specialist) {
        selected.push(specialist);
      } else {
        logger.warn({ tag }, 'Requested specialist is not registered');
      }
    }
    return selected;
  }
}
