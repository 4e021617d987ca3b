// Replaced by tsup's `define` with the version from package.json
declare const __VERSION__: string;

export const version = typeof __VERSION__ !== "undefined" ? __VERSION__ : "0.0.0-dev";
