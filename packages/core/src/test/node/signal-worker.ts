/**
 * Worker fixture for cross-thread tests.
 *
 * Attaches to the signal the test shares on the worker, then acts according
 * to `workerData.mode`:
 * - 'block': blocks in waitSync() and reports the elapsed time
 * - 'fire': waits `delay` ms, fires `args`, reports completion
 * - 'listen': connects a handler that reports every forwarded fire
 */

import {parentPort, workerData} from 'node:worker_threads';
import {attach} from '../../index.js';
import type {FixtureMessage, WorkerOptions} from './test-utils.js';

if (!parentPort) {
  throw new Error('This file must be run as a worker');
}
const port = parentPort;
const options = workerData as WorkerOptions;

function report(message: FixtureMessage): void {
  port.postMessage(message);
}

const remote = await attach<Array<unknown>>(port);

switch (options.mode) {
  case 'block': {
    report({kind: 'attached'});
    const elapsed = remote.waitSync();
    report({kind: 'waited', elapsed, ready: remote.ready});
    remote.close();
    break;
  }

  case 'fire': {
    report({kind: 'attached'});
    await new Promise((resolve) => setTimeout(resolve, options.delay ?? 0));
    await remote.fire(...(options.args ?? []));
    report({kind: 'fired'});
    remote.close();
    break;
  }

  case 'listen': {
    remote.connect((...args) => {
      report({kind: 'received', args});
    });
    // Posted after the subscription, so the host has seen it by the time the
    // test reads this
    report({kind: 'attached'});
    break;
  }

  default:
    throw new Error(`Unknown mode: ${String(options.mode)}`);
}
