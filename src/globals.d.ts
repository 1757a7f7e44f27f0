/**
 * Compile-time flags injected by Vite and Vitest `define`
 */
declare const __DEBUG__: boolean;
