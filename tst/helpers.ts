import { createWorld, createWorldSettings, type WorldSettings } from '../src';

/** creates a world from default settings, optionally adjusted before the world is created */
export const createTestWorld = (configure?: (settings: WorldSettings) => void) => {
    const settings = createWorldSettings();
    configure?.(settings);
    return createWorld(settings);
};

/** turns off gravity, friction and attraction, leaving collisions and boundaries */
export const disableForces = (settings: WorldSettings): void => {
    settings.gravityEnabled = false;
    settings.frictionEnabled = false;
    settings.attractionEnabled = false;
};
