/**
 * Entry point for GitHub Action execution.
 *
 * Imports and invokes main run() function.
 *
 * @module
 */

import { run } from './main'

void run()
