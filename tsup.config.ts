import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — the library only touches Uint8Array, TextDecoder
  // and TextEncoder, which Node.js and browsers both provide.
  platform: "neutral",
});
