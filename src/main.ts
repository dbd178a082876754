/**
 * @fileoverview Entry point for the container image GitHub Action.
 */

import { run } from './action';

// Execute the action
void run();
