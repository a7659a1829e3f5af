/**
 * HTML cleaning utilities
 * Remove non-prose elements before text extraction
 */

import * as cheerio from 'cheerio';
import {
  NOISE_CLASS_WORDS,
  NOISE_CONTAINER_SELECTORS,
  REMOVE_SELECTORS,
  TABLE_SELECTORS,
} from '../config/constants';

/**
 * Remove structural, tabular and schedule-like elements in place
 *
 * 1. Scripts, styles, embeds, navigation, header, footer, sidebars
 * 2. Every table node (tables hold timetables, not prose)
 * 3. div/section containers whose class or id mentions a noise word
 *
 * @param $ - Loaded document
 */
export function removeNoiseElements($: cheerio.CheerioAPI): void {
  $(REMOVE_SELECTORS.join(', ')).remove();
  $(TABLE_SELECTORS.join(', ')).remove();

  $(NOISE_CONTAINER_SELECTORS.join(', ')).each((_, element) => {
    const $element = $(element);
    const className = ($element.attr('class') ?? '').toLowerCase();
    const id = ($element.attr('id') ?? '').toLowerCase();

    if (NOISE_CLASS_WORDS.some((word) => className.includes(word) || id.includes(word))) {
      $element.remove();
    }
  });
}

