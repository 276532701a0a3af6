/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { importArticles } from "./importer";
export { process } from "./processor";
export { write } from "./writer";
export { stats } from "./stats";
