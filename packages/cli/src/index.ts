#!/usr/bin/env node

import { createProgram } from './program';

createProgram().parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});
