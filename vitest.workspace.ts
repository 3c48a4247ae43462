import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/types",
  "packages/identity",
  "packages/chain",
  "packages/ledger",
  "packages/store",
  "packages/node",
]);
