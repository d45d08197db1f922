/**
 * Pipeline modules export
 */

export { revision } from "./revision";
export { resolve } from "./resolver";
export { scan } from "./scanner";
export { process } from "./processor";
export { cover } from "./cover";
export { write } from "./writer";
export { stats } from "./stats";
