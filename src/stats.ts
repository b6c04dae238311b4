/** counters describing the last world update */
export type WorldStats = {
    /** total number of updates */
    ticks: number;
    /** live bodies at the start of the last update */
    bodies: number;
    /** bodies integrated in the last update */
    free: number;
    /** bodies skipped because they were fixed, including ones that came to rest during the update */
    fixed: number;
    /** overlaps resolved */
    collisions: number;
    /** window bounces, counted per axis */
    bounces: number;
    /** bodies that left the universe */
    despawned: number;
};

export function init(): WorldStats {
    return {
        ticks: 0,
        bodies: 0,
        free: 0,
        fixed: 0,
        collisions: 0,
        bounces: 0,
        despawned: 0,
    };
}

/** clears the per-update counters, keeps the tick count */
export function reset(stats: WorldStats): void {
    stats.bodies = 0;
    stats.free = 0;
    stats.fixed = 0;
    stats.collisions = 0;
    stats.bounces = 0;
    stats.despawned = 0;
}
