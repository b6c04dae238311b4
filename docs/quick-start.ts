import { type Body, body, createWorld, createWorldSettings, type Listener, spawnRandomBodies, updateWorld } from '../src';

// all simulation constants live in the world settings.
// adjust them before creating the world, e.g. to switch off body vs body collisions.
const worldSettings = createWorldSettings();
worldSettings.collisionsEnabled = true;

// the settings are validated when the world is created
const world = createWorld(worldSettings);

// spawn the classic scene: 100 bodies scattered across the universe box
spawnRandomBodies(world);

// or add bodies one at a time
const ball = body.create(world, {
    position: [0, 20, 0],
    velocity: [1, 0, 0],
    mass: 1.5,
    radius: 10,
});

// update the world
// typically you will do this in a loop, e.g. requestAnimationFrame or setInterval, here we do a single step.
// updateWorld returns the ids of bodies that left the universe, so the host can stop drawing them.
const despawnedIds = updateWorld(world, undefined, 1 / 60);

// to be told about what happens during an update, pass a listener
const listener: Listener = {
    onBodyFixed: (b: Body) => {
        // ... e.g. change the body's color
    },
    onBodyCollision: (b, other) => {
        // ...
    },
    onWallBounce: (b, axis, side) => {
        // ...
    },
    onBodyDespawned: (b: Body) => {
        // ...
    },
};

updateWorld(world, listener, 1 / 60);

// after an update, draw each body at its render-space translation
for (const b of body.iterate(world)) {
    const [x, y] = b.translation;
    // drawCircle(x, y, b.radius, b.fixed ? 'grey' : 'green');
}

export { ball, despawnedIds };
