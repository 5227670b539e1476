/**
 * Place to PlaceRecord Mapper
 *
 * Converts Places API responses into the flat records the pipeline sorts,
 * enriches and writes.
 *
 * @module places/mapper
 */

import type { Coordinates } from '../schemas/common.js';
import type { PlaceRecord, Review } from '../schemas/place.js';
import { haversineDistance, round2 } from '../geo/distance.js';
import type { Place, PlaceDetails, RawReview } from './client.js';

/** Business status the API uses for places that no longer exist */
export const PERMANENTLY_CLOSED_STATUS = 'CLOSED_PERMANENTLY';

/**
 * Coordinates of a raw place, if the API returned a location.
 */
export function placeCoordinates(place: Place): Coordinates | undefined {
  if (!place.location) {
    return undefined;
  }
  return { lat: place.location.latitude, lng: place.location.longitude };
}

/**
 * Map a search result to a PlaceRecord.
 *
 * @param place - Raw place from Text Search
 * @param origin - Search origin; distance fields are null without one
 *
 * @example
 * ```typescript
 * const record = mapPlaceToRecord(place, { lat: 47.6101, lng: -122.3344 });
 * record.distanceKm; // 1.24
 * ```
 */
export function mapPlaceToRecord(place: Place, origin?: Coordinates): PlaceRecord {
  const coordinates = placeCoordinates(place);
  const distance = origin && coordinates ? haversineDistance(origin, coordinates) : null;
  const businessStatus = place.businessStatus ?? 'UNKNOWN';

  return {
    placeId: place.id ?? '',
    name: place.displayName?.text || 'Unknown',
    address: place.formattedAddress ?? 'No address available',
    latitude: coordinates?.lat ?? null,
    longitude: coordinates?.lng ?? null,
    rating: place.rating ?? null,
    userRatingsTotal: place.userRatingCount ?? null,
    types: place.types ?? [],
    category: place.primaryType ?? place.types?.[0] ?? null,
    priceLevel: place.priceLevel ?? null,
    businessStatus,
    permanentlyClosed: businessStatus === PERMANENTLY_CLOSED_STATUS,
    distanceMeters: distance === null ? null : round2(distance),
    distanceKm: distance === null ? null : round2(distance / 1000),
  };
}

/**
 * Map search results to PlaceRecords, preserving order.
 */
export function mapPlacesToRecords(places: Place[], origin?: Coordinates): PlaceRecord[] {
  return places.map((place) => mapPlaceToRecord(place, origin));
}

/**
 * Map a raw review.
 */
export function mapReview(review: RawReview): Review {
  return {
    authorName: review.authorAttribution?.displayName || 'Anonymous',
    authorPhoto: review.authorAttribution?.photoUri ?? '',
    rating: review.rating ?? 0,
    text: review.text?.text ?? '',
    timeDescription: review.relativePublishTimeDescription ?? '',
    publishTime: review.publishTime ?? '',
  };
}

/**
 * Detail fields merged into a record by the enricher.
 */
export interface DetailFields {
  reviews: Review[];
  reviewCount: number;
  openingHours: string[];
  phone: string;
  website: string;
  businessStatus: string;
  photosAvailable: number;
  userRatingsTotal: number | null;
}

/**
 * Extract the enrichment fields from a Place Details response.
 *
 * @param details - Raw details response
 * @param maxReviews - Number of reviews to keep
 */
export function mapDetails(details: PlaceDetails, maxReviews: number): DetailFields {
  const reviews = (details.reviews ?? []).slice(0, Math.max(0, maxReviews)).map(mapReview);

  return {
    reviews,
    reviewCount: reviews.length,
    openingHours: details.regularOpeningHours?.weekdayDescriptions ?? [],
    phone: details.internationalPhoneNumber ?? '',
    website: details.websiteUri ?? '',
    businessStatus: details.businessStatus ?? 'UNKNOWN',
    photosAvailable: details.photos?.length ?? 0,
    userRatingsTotal: details.userRatingCount ?? null,
  };
}
