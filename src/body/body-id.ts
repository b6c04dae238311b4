/**
 * a body identifier, unique for the lifetime of a world.
 * ids are handed out in creation order and never reused, so a stale id never resolves to a newer body.
 */
export type BodyId = number;

/** an invalid BodyId */
export const INVALID_BODY_ID: BodyId = -1;
