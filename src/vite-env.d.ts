/// <reference types="vite/client" />

// Build-mode flag: true under Vitest and in dev, replaced by a
// process.env.NODE_ENV check in the library build
declare const __DEV__: boolean;
