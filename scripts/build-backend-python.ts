#!/usr/bin/env node
import { pythonBackendFactory } from '../src/backends/python.js';
import { runCli } from '../src/cli/app.js';
import { handleError } from '../src/cli/utils/error-handler.js';

runCli(process.argv, { name: 'build-backend-python', createFactory: () => pythonBackendFactory() }).catch(handleError);
