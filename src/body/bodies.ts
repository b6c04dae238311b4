import type { Body } from './body';
import type { BodyId } from './body-id';

/** world bodies state */
export type Bodies = {
    /** live bodies, in creation order. the integrator visits bodies in this order */
    list: Body[];
    /** next body id */
    nextId: BodyId;
};

export function init(): Bodies {
    return {
        list: [],
        nextId: 0,
    };
}
