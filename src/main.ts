/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point (action.yml runs dist/main.js).
 */

import { run } from './action';

void run();
