// Core types for phrasewright
export * from "./generation.js";
export * from "./wordlist.js";
