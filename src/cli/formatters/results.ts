/**
 * Result Listing Formatters
 *
 * Terminal listing of search results: one line per place in quiet mode,
 * a block per place otherwise.
 *
 * @module cli/formatters/results
 */

import chalk from 'chalk';
import type { PlaceRecord, Review } from '../../schemas/place.js';

/** Review text shown in the detailed listing before truncation */
const REVIEW_TEXT_LENGTH = 200;

export interface ResultListOptions {
  /** One line per place */
  compact?: boolean;
  /** Include fetched reviews in the detailed listing */
  showReviews?: boolean;
}

/**
 * "1. Harbor Food Bank (1.1km) ⭐4.6 (212 reviews)"
 */
export function formatCompactLine(place: PlaceRecord, index: number): string {
  const distance = place.distanceKm !== null ? ` (${place.distanceKm.toFixed(1)}km)` : '';
  const rating = place.rating ? ` ⭐${place.rating}` : '';
  const reviews = place.userRatingsTotal ? ` (${place.userRatingsTotal} reviews)` : '';
  return `${index}. ${place.name}${distance}${rating}${reviews}`;
}

function formatReviewLines(review: Review): string[] {
  const text =
    review.text.length > REVIEW_TEXT_LENGTH ? `${review.text.slice(0, REVIEW_TEXT_LENGTH)}...` : review.text;
  const stars = '⭐'.repeat(Math.floor(review.rating));
  const lines = [`      • ${[review.authorName, stars, review.timeDescription].filter(Boolean).join(' ')}`];
  if (text.trim()) {
    lines.push(`        "${text}"`);
  }
  return lines;
}

/**
 * Detailed block for one place.
 */
export function formatPlaceBlock(place: PlaceRecord, index: number, showReviews = false): string[] {
  const lines = [chalk.bold(`${index}. ${place.name}`), `   📍 ${place.address}`];

  if (place.rating !== null) {
    const total = place.userRatingsTotal ?? 0;
    lines.push(`   ⭐ Rating: ${place.rating}/5${total > 0 ? ` (${total} reviews)` : ''}`);
  }
  if (place.distanceKm !== null) lines.push(`   📏 Distance: ${place.distanceKm.toFixed(1)} km`);
  if (place.phone) lines.push(`   📞 Phone: ${place.phone}`);
  if (place.website) lines.push(`   🌐 Website: ${place.website}`);
  if (place.email) lines.push(`   📧 Email: ${place.email}`);
  if (place.openingHours && place.openingHours.length > 0) lines.push(`   🕒 Hours: ${place.openingHours[0]}`);
  if (place.types.length > 0) lines.push(`   🏷️  Categories: ${place.types.slice(0, 3).join(', ')}`);

  if (showReviews && place.reviews && place.reviews.length > 0) {
    lines.push(`   📝 Reviews (${place.reviews.length}):`);
    lines.push(...place.reviews.flatMap(formatReviewLines));
  }

  return lines;
}

/**
 * Full listing, header included.
 */
export function formatResults(places: PlaceRecord[], options: ResultListOptions = {}): string[] {
  if (places.length === 0) {
    return ['No donation opportunities found.'];
  }

  const lines = ['', `Found ${places.length} donation opportunities:`, '-'.repeat(80)];

  places.forEach((place, i) => {
    if (options.compact) {
      lines.push(formatCompactLine(place, i + 1));
    } else {
      lines.push(...formatPlaceBlock(place, i + 1, options.showReviews), '');
    }
  });

  return lines;
}
