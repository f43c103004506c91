/**
 * @racelab/analytics
 *
 * Reflection of experiences into playbooks, and the statistics behind it.
 */

export { ACEReflector } from './reflector/ace-reflector.js';
export type { ACEReflectorOptions } from './reflector/ace-reflector.js';
export { Playbook } from './reflector/playbook.js';

export { binomialUpperTail } from './stats/binomial.js';
export { wilsonInterval, normalQuantile } from './stats/wilson.js';
export { bonferroniThreshold } from './stats/bonferroni.js';
export { distanceBand, UNKNOWN_DISTANCE_BAND } from './distance-bands.js';
