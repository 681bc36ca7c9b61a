// Build-mode flag injected by Vite/Vitest `define`. Guards precondition
// checks that production builds strip.
declare const __DEV__: boolean;
