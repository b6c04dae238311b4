import type { BodyId } from './body/body-id';
import type { Listener } from './listener';
import { updateWorld } from './update';
import { assert, assertNever } from './utils/assert';
import type { World } from './world';

/** run state of a simulation controller */
export enum ControllerStatus {
    /** the world is updated every frame */
    RUNNING = 0,
    /** the world is not updated */
    PAUSED = 1,
    /** the world is updated for a number of frames, then the controller pauses */
    STEPPING_FORWARD = 2,
}

export type ControllerState =
    | { status: ControllerStatus.RUNNING }
    | { status: ControllerStatus.PAUSED }
    | { status: ControllerStatus.STEPPING_FORWARD; framesRemaining: number };

/** settings for creating a simulation controller */
export type SimulationControllerSettings = {
    /** start paused @see DEFAULT_SIMULATION_CONTROLLER_SETTINGS */
    paused?: boolean;

    /** largest time step passed to updateWorld, longer frames are clamped @see DEFAULT_SIMULATION_CONTROLLER_SETTINGS */
    maxTimeStep?: number;
};

export const DEFAULT_SIMULATION_CONTROLLER_SETTINGS = {
    paused: false,
    maxTimeStep: 1 / 30,
};

/**
 * Decides, frame by frame, whether the host should update the world.
 * Holds no simulation state, the world is unaware of it.
 */
export type SimulationController = {
    /** @readonly current run state */
    state: ControllerState;

    /** largest time step passed to updateWorld */
    maxTimeStep: number;
};

export function create(settings: SimulationControllerSettings = {}): SimulationController {
    const maxTimeStep = settings.maxTimeStep ?? DEFAULT_SIMULATION_CONTROLLER_SETTINGS.maxTimeStep;
    assert(Number.isFinite(maxTimeStep) && maxTimeStep > 0, `maxTimeStep must be > 0, got ${maxTimeStep}`);

    const paused = settings.paused ?? DEFAULT_SIMULATION_CONTROLLER_SETTINGS.paused;

    return {
        state: paused ? { status: ControllerStatus.PAUSED } : { status: ControllerStatus.RUNNING },
        maxTimeStep,
    };
}

/** stops updating the world, cancels any remaining step-forward frames */
export function pause(controller: SimulationController): void {
    controller.state = { status: ControllerStatus.PAUSED };
}

/** updates the world every frame again */
export function resume(controller: SimulationController): void {
    controller.state = { status: ControllerStatus.RUNNING };
}

/** pauses a running controller, resumes a paused or stepping one */
export function toggle(controller: SimulationController): void {
    if (controller.state.status === ControllerStatus.RUNNING) {
        pause(controller);
    } else {
        resume(controller);
    }
}

/**
 * Updates the world for the given number of frames, then pauses.
 * Calling this while already stepping adds to the remaining frames.
 */
export function stepForward(controller: SimulationController, frames = 1): void {
    assert(Number.isInteger(frames) && frames > 0, `frames must be a positive integer, got ${frames}`);

    const state = controller.state;
    const framesRemaining = state.status === ControllerStatus.STEPPING_FORWARD ? state.framesRemaining + frames : frames;

    controller.state = { status: ControllerStatus.STEPPING_FORWARD, framesRemaining };
}

export function isPaused(controller: SimulationController): boolean {
    return controller.state.status === ControllerStatus.PAUSED;
}

/**
 * Whether the world should be updated this frame.
 * Consumes one frame when stepping forward, and pauses once the last one is consumed.
 */
export function shouldStep(controller: SimulationController): boolean {
    const state = controller.state;

    switch (state.status) {
        case ControllerStatus.RUNNING:
            return true;
        case ControllerStatus.PAUSED:
            return false;
        case ControllerStatus.STEPPING_FORWARD: {
            const framesRemaining = state.framesRemaining - 1;
            controller.state =
                framesRemaining > 0
                    ? { status: ControllerStatus.STEPPING_FORWARD, framesRemaining }
                    : { status: ControllerStatus.PAUSED };
            return true;
        }
        default:
            return assertNever(state, 'unknown controller state');
    }
}

/**
 * Advances the world by one host frame, if the controller allows it.
 * @param controller the simulation controller
 * @param world the world to update
 * @param listener optional listener passed to updateWorld
 * @param frameTime time since the last frame in seconds, clamped to maxTimeStep
 * @returns ids of bodies despawned this frame, empty if the world was not updated
 */
export function advance(controller: SimulationController, world: World, listener: Listener | undefined, frameTime: number): BodyId[] {
    assert(Number.isFinite(frameTime) && frameTime >= 0, `frame time must be a non-negative finite number, got ${frameTime}`);

    if (!shouldStep(controller)) {
        return [];
    }

    return updateWorld(world, listener, Math.min(frameTime, controller.maxTimeStep));
}
