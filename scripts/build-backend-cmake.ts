#!/usr/bin/env node
import { cmakeBackendFactory } from '../src/backends/cmake.js';
import { runCli } from '../src/cli/app.js';
import { handleError } from '../src/cli/utils/error-handler.js';

runCli(process.argv, { name: 'build-backend-cmake', createFactory: () => cmakeBackendFactory() }).catch(handleError);
