import { parentPort } from 'worker_threads';
import { handleClusterMessage } from './worker-protocol.js';

// Entry point of a clustering worker thread; one job at a time
const port = parentPort;
if (port) {
  port.on('message', (message: unknown) => {
    port.postMessage(handleClusterMessage(message));
  });
}
