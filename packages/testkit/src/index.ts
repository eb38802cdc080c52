export { quietCatalog, seedCatalog } from "./catalog.js";
export type { SeedOptions, Seeded } from "./catalog.js";
export { measure, flushAsync } from "./timers.js";
export type { Timed } from "./timers.js";
