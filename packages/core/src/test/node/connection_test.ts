import {suite, test} from 'node:test';
import * as assert from 'node:assert';
import {Signal} from '../../index.js';

void suite('Connection', () => {
  void test('starts connected', () => {
    const signal = new Signal<[]>();
    const connection = signal.connect(() => {});

    assert.strictEqual(connection.connected, true);
  });

  void test('disconnect() removes the handler', () => {
    const signal = new Signal<[]>();
    const connection = signal.connect(() => {});

    connection.disconnect();

    assert.strictEqual(connection.connected, false);
    assert.strictEqual(signal.size, 0);
  });

  void test('disconnect() twice is the same as once', () => {
    const signal = new Signal<[string]>();
    const calls: Array<string> = [];
    const a = signal.connect((x) => calls.push(`a${x}`));
    signal.connect((x) => calls.push(`b${x}`));

    a.disconnect();
    a.disconnect();
    signal.fire('!');

    assert.strictEqual(a.connected, false);
    assert.strictEqual(signal.size, 1);
    assert.deepStrictEqual(calls, ['b!']);
  });

  void test('stays disconnected after later connects', () => {
    const signal = new Signal<[]>();
    const first = signal.connect(() => {});
    first.disconnect();

    signal.connect(() => {});
    signal.connect(() => {});

    assert.strictEqual(first.connected, false);
  });

  void test('the same handler connected twice runs twice', () => {
    const signal = new Signal<[]>();
    let calls = 0;
    const handler = () => {
      calls++;
    };
    const a = signal.connect(handler);
    signal.connect(handler);

    signal.fire();
    a.disconnect();
    signal.fire();

    assert.strictEqual(calls, 3);
  });

  void test('dropping the handle keeps the handler connected', () => {
    const signal = new Signal<[]>();
    let calls = 0;
    (() => {
      signal.connect(() => {
        calls++;
      });
    })();

    signal.fire();

    assert.strictEqual(calls, 1);
  });

  void test('disconnects at the end of a using block', () => {
    const signal = new Signal<[]>();
    let calls = 0;
    {
      using _connection = signal.connect(() => {
        calls++;
      });
      signal.fire();
    }
    signal.fire();

    assert.strictEqual(calls, 1);
  });
});
