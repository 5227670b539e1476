/**
 * Email Report Rendering
 *
 * Renders search results as the plain-text and HTML bodies of the results
 * email.
 *
 * @module notify/report
 */

import type { PlaceRecord, Review } from '../schemas/place.js';
import type { SearchInfo } from '../schemas/search.js';

// ============================================================================
// Constants
// ============================================================================

/** Reviews shown per place in the HTML body */
const HTML_REVIEW_LIMIT = 3;

/** Reviews shown per place in the text body */
const TEXT_REVIEW_LIMIT = 2;

/** Review text length in the text body before truncation */
const TEXT_REVIEW_LENGTH = 100;

const RULE_WIDTH = 60;

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const FOOTER = 'This report was generated automatically by Donation Finder.';

// ============================================================================
// Types
// ============================================================================

export interface ReportInput {
  places: PlaceRecord[];
  searchInfo: SearchInfo;
  /** Defaults to now */
  generatedAt?: Date;
}

export interface RenderedReport {
  text: string;
  html: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Escape text for inclusion in HTML element content or attribute values.
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * One star per whole rating point.
 */
export function ratingStars(rating: number | null | undefined): string {
  return rating ? '⭐'.repeat(Math.floor(rating)) : '';
}

/**
 * "4.5 ⭐⭐⭐⭐", or "No rating" for unrated places.
 */
export function ratingLabel(rating: number | null): string {
  return rating ? `${rating} ${ratingStars(rating)}` : 'No rating';
}

/**
 * Local timestamp such as "October 18, 2026 at 02:30 PM".
 */
export function formatTimestamp(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const meridiem = hours < 12 ? 'AM' : 'PM';
  return `${MONTHS[date.getMonth()]} ${String(date.getDate()).padStart(2, '0')}, ${date.getFullYear()} at ${String(hour12).padStart(2, '0')}:${minutes} ${meridiem}`;
}

function truncate(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

// ============================================================================
// Text Report
// ============================================================================

function textReview(review: Review): string {
  return [
    `     • ${review.authorName} (${review.rating} ${ratingStars(review.rating)}):`,
    `       "${truncate(review.text, TEXT_REVIEW_LENGTH)}"`,
    `       (${review.timeDescription || 'Unknown date'})`,
  ].join('\n');
}

function textPlace(place: PlaceRecord, index: number): string {
  const lines = [
    `${index}. ${place.name}`,
    `   Rating: ${ratingLabel(place.rating)}`,
    `   Address: ${place.address}`,
  ];

  if (place.phone) lines.push(`   Phone: ${place.phone}`);
  if (place.email) lines.push(`   Email: ${place.email}`);
  if (place.website) lines.push(`   Website: ${place.website}`);
  if (place.distanceKm !== null) lines.push(`   Distance: ${place.distanceKm.toFixed(1)} km`);

  if (place.reviews && place.reviews.length > 0) {
    lines.push(`   Reviews (${place.reviews.length} total):`);
    lines.push(...place.reviews.slice(0, TEXT_REVIEW_LIMIT).map(textReview));
  }

  lines.push('-'.repeat(RULE_WIDTH));
  return lines.join('\n');
}

/**
 * Render the plain-text body.
 */
export function renderTextReport(input: ReportInput): string {
  const { places, searchInfo } = input;
  const generated = formatTimestamp(input.generatedAt ?? new Date());

  const header = [
    'DONATION OPPORTUNITIES FOUND',
    `Generated: ${generated}`,
    '',
    'SEARCH DETAILS:',
    `- Search Type: ${searchInfo.type}`,
    `- Location: ${searchInfo.location}`,
    `- Keywords: ${searchInfo.keywords}`,
    `- Results Found: ${places.length} organizations`,
    '',
    'RESULTS:',
    '='.repeat(RULE_WIDTH),
    '',
  ];

  const body = places.map((place, i) => textPlace(place, i + 1));

  return [...header, ...body, '', FOOTER, ''].join('\n');
}

// ============================================================================
// HTML Report
// ============================================================================

const STYLES = `
  body { font-family: Arial, sans-serif; margin: 20px; }
  .header { background-color: #f8f9fa; padding: 20px; border-radius: 8px; margin-bottom: 20px; }
  .place { border: 1px solid #ddd; border-radius: 8px; padding: 15px; margin-bottom: 15px; }
  .place-name { color: #2c3e50; font-size: 18px; font-weight: bold; margin-bottom: 8px; }
  .place-info { color: #666; margin: 5px 0; }
  .rating { color: #f39c12; font-weight: bold; }
  .email { color: #27ae60; font-weight: bold; }
  .reviews { margin-top: 10px; padding-top: 10px; border-top: 1px solid #eee; }
  .review { margin: 10px 0; padding: 8px; background-color: #f8f9fa; border-radius: 4px; }
  .footer { margin-top: 30px; padding-top: 20px; border-top: 2px solid #eee; color: #7f8c8d; font-size: 12px; }
`;

function htmlReview(review: Review): string {
  return [
    '<div class="review">',
    `<div><strong>${escapeHtml(review.authorName)}</strong> (${review.rating} ${ratingStars(review.rating)})</div>`,
    `<div>"${escapeHtml(review.text)}"</div>`,
    `<div style="font-size: 11px; color: #999;">${escapeHtml(review.timeDescription || 'Unknown date')}</div>`,
    '</div>',
  ].join('');
}

function htmlPlace(place: PlaceRecord, index: number): string {
  const parts = [
    '<div class="place">',
    `<div class="place-name">${index}. ${escapeHtml(place.name)}</div>`,
    `<div class="place-info rating">Rating: ${escapeHtml(ratingLabel(place.rating))}</div>`,
    `<div class="place-info">Address: ${escapeHtml(place.address)}</div>`,
  ];

  if (place.phone) {
    parts.push(`<div class="place-info">Phone: ${escapeHtml(place.phone)}</div>`);
  }
  if (place.email) {
    parts.push(`<div class="place-info email">Email: ${escapeHtml(place.email)}</div>`);
  }
  if (place.website) {
    const url = escapeHtml(place.website);
    parts.push(`<div class="place-info">Website: <a href="${url}">${url}</a></div>`);
  }
  if (place.distanceKm !== null) {
    parts.push(`<div class="place-info">Distance: ${place.distanceKm.toFixed(1)} km</div>`);
  }
  if (place.reviews && place.reviews.length > 0) {
    parts.push('<div class="reviews"><strong>Recent Reviews:</strong>');
    parts.push(...place.reviews.slice(0, HTML_REVIEW_LIMIT).map(htmlReview));
    parts.push('</div>');
  }

  parts.push('</div>');
  return parts.join('\n');
}

/**
 * Render the HTML body. All values taken from results are escaped.
 */
export function renderHtmlReport(input: ReportInput): string {
  const { places, searchInfo } = input;
  const generated = formatTimestamp(input.generatedAt ?? new Date());

  return [
    '<html>',
    `<head><style>${STYLES}</style></head>`,
    '<body>',
    '<div class="header">',
    '<h2>Donation Opportunities Found</h2>',
    '<ul>',
    `<li><strong>Search Type:</strong> ${escapeHtml(searchInfo.type)}</li>`,
    `<li><strong>Location:</strong> ${escapeHtml(searchInfo.location)}</li>`,
    `<li><strong>Keywords:</strong> ${escapeHtml(searchInfo.keywords)}</li>`,
    `<li><strong>Results Found:</strong> ${places.length} organizations</li>`,
    `<li><strong>Generated:</strong> ${generated}</li>`,
    '</ul>',
    '</div>',
    ...places.map((place, i) => htmlPlace(place, i + 1)),
    `<div class="footer"><p>${FOOTER}</p></div>`,
    '</body>',
    '</html>',
  ].join('\n');
}

/**
 * Render both bodies with the same timestamp.
 */
export function renderReport(input: ReportInput): RenderedReport {
  const withTime = { ...input, generatedAt: input.generatedAt ?? new Date() };
  return {
    text: renderTextReport(withTime),
    html: renderHtmlReport(withTime),
  };
}
