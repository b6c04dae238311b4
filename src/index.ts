/** @module ballpit */

export type { BodyId } from './body/body-id';
export { INVALID_BODY_ID } from './body/body-id';
export { BodyState } from './body/body-state';
export type { Body, BodySettings } from './body/body';
export * as body from './body/body';
export type { BodySnapshot, Snapshot } from './body/snapshot';
export * as snapshot from './body/snapshot';

export * as forces from './forces';
export * as collisions from './collisions';
export * as boundary from './boundary';

export type { WorldStats } from './stats';
export * as stats from './stats';

export type { ControllerState, SimulationController, SimulationControllerSettings } from './controller';
export { ControllerStatus } from './controller';
export * as controller from './controller';

export * from './listener';
export * from './scene';
export * from './update';
export * from './world';
export * from './world-settings';
