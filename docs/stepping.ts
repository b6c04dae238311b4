import { controller, createWorld, createWorldSettings, spawnRandomBodies } from '../src';

const world = createWorld(createWorldSettings());
spawnRandomBodies(world);

/* SNIPPET_START: controller */
// the controller decides, frame by frame, whether the world is updated.
// long frames are clamped to maxTimeStep.
const simulation = controller.create({ maxTimeStep: 1 / 30 });

let lastTime = performance.now();

function gameLoop() {
    const currentTime = performance.now();
    const frameTime = (currentTime - lastTime) / 1000;
    lastTime = currentTime;

    const despawnedIds = controller.advance(simulation, world, undefined, frameTime);

    // ... stop drawing despawned bodies, render the rest ...

    setTimeout(gameLoop, 1000 / 60);
}
/* SNIPPET_END: controller */

/* SNIPPET_START: input */
// e.g. wire keys to the controller
function onKeyDown(key: string) {
    if (key === ' ') {
        // pause / resume
        controller.toggle(simulation);
    } else if (key === 'ArrowRight') {
        // advance a single frame, then pause
        controller.stepForward(simulation);
    }
}
/* SNIPPET_END: input */

export { gameLoop, onKeyDown };
