/**
 * Lifecycle state of a body.
 * FREE -> FIXED (rest detection) and FREE | FIXED -> DESPAWNED (universe bounds) are the only transitions.
 */
export enum BodyState {
    FREE = 0,
    FIXED = 1,
    DESPAWNED = 2,
}
