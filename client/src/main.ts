/**
 * main.ts
 *
 * Entry script loaded by every page. Importing the components registers
 * their custom elements; the server markup does the rest.
 */

import './components/theme-toggle.js';
import './components/collection-table.js';
import './components/floating-buttons.js';
import * as log from './core/log.js';

log.debug('[main] components registered');
