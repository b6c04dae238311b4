import * as bodies from './body/bodies';
import * as snapshot from './body/snapshot';
import * as stats from './stats';
import { validateWorldSettings, type WorldSettings } from './world-settings';

/** simulation world state */
export type World = {
    /** world options */
    settings: WorldSettings;

    /** bodies state */
    bodies: bodies.Bodies;

    /** tick-start copy of all bodies, reused between updates */
    snapshot: snapshot.Snapshot;

    /** counters from the last update */
    stats: stats.WorldStats;
};

/**
 * Creates a new world with the given settings
 * @param settings world settings, validated here
 * @returns a new world
 */
export function createWorld(settings: WorldSettings): World {
    validateWorldSettings(settings);

    return {
        settings,
        bodies: bodies.init(),
        snapshot: snapshot.init(),
        stats: stats.init(),
    };
}
