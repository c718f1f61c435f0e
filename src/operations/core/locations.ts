/**
 * Location record construction and export
 *
 * @module locations
 * @since v0.1.0
 */

import { ValidationError } from "../../errors";
import type { LocationMap, LocationRecord, LocationRecordObject } from "../../types";

export interface ResponseRegion {
  readonly start: number;
  readonly end: number;
  readonly name: string;
}

/**
 * Key of a bed-derived record
 */
export function windowKey(seq: number): string {
  return `seq_${seq}`;
}

/**
 * Key of a synthetic-placement record
 */
export function placementKey(seq: number, token: string): string {
  return `seq_${seq}_emb_${token}`;
}

/**
 * Build a frozen location record
 *
 * @throws {ValidationError} When a region ends before it starts
 */
export function createLocationRecord(
  seq: number,
  mutation: { readonly start: number; readonly end: number; readonly name: string },
  responses: readonly ResponseRegion[]
): LocationRecord {
  if (mutation.end < mutation.start) {
    throw new ValidationError(
      `Mutation region ${mutation.name} ends (${mutation.end}) before it starts (${mutation.start})`
    );
  }
  for (const response of responses) {
    if (response.end < response.start) {
      throw new ValidationError(
        `Response region ${response.name} ends (${response.end}) before it starts (${response.start})`
      );
    }
  }

  return Object.freeze({
    seq,
    mutStart: mutation.start,
    mutEnd: mutation.end,
    mutName: mutation.name,
    respStart: Object.freeze(responses.map((response) => response.start)),
    respEnd: Object.freeze(responses.map((response) => response.end)),
    respNames: Object.freeze(responses.map((response) => response.name)),
  });
}

/**
 * Response regions of a record, zipped back together
 */
export function responseRegions(record: LocationRecord): ResponseRegion[] {
  return record.respStart.map((start, i) => ({
    start,
    end: record.respEnd[i] ?? start,
    name: record.respNames[i] ?? "",
  }));
}

/**
 * Plain-object view with snake_case fields, ready for `JSON.stringify`
 */
export function toLocationObject(locations: LocationMap): Record<string, LocationRecordObject> {
  const result: Record<string, LocationRecordObject> = {};
  for (const [key, record] of locations) {
    result[key] = {
      seq: record.seq,
      mut_start: record.mutStart,
      mut_end: record.mutEnd,
      mut_name: record.mutName,
      resp_start: [...record.respStart],
      resp_end: [...record.respEnd],
      resp_names: [...record.respNames],
    };
  }
  return result;
}
