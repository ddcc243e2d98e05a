/**
 * Lineup Tracker API Server
 *
 * PORT overrides the default port.
 */

import { API } from '../config/tracker.js';
import { createApp } from './app.js';

const port = Number(process.env.PORT) || API.DEFAULT_PORT;

createApp().listen(port, () => {
  console.log(`[Server] Lineup API listening on port ${port}`);
});
