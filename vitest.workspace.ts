import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/registry",
  "packages/verify",
  "packages/node",
]);
