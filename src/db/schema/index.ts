export * from "./instance-lifecycles.js";
export * from "./lifecycle-transitions.js";
