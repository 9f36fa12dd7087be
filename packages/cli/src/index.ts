#!/usr/bin/env node

import { ConfigStore } from '@roster/core';
import { createProgram } from './program';
import { DependencyInjectionService } from './services/dependency-injection';

const dependencyService = new DependencyInjectionService({
  configStore: new ConfigStore.EnvConfigStore(process.env),
});

createProgram(dependencyService).parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
