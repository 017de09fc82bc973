/**
 * Script evaluated by the sandbox child (`node -e`).
 *
 * It waits for one IPC message `{ units, timeoutMs }`, runs the units in a fresh
 * `vm` context and replies `{ ok: true }` or `{ ok: false, error }` before exiting.
 * A unit that evaluates to a promise is awaited, and a rejection nobody handled
 * while the units ran fails the program too.
 * Keep it dependency-free: the child only has Node's builtins.
 * `describeThrown` mirrors describe.ts; harness.test.ts pins the two together.
 */
export const HARNESS_SOURCE = `
const vm = require('node:vm');
const assert = require('node:assert');

function describeThrown(value) {
  if (typeof value === 'object' && value !== null && 'message' in value) {
    return (typeof value.name === 'string' && value.name ? value.name : 'Error') + ': ' + String(value.message);
  }
  return String(value);
}

function settleWithin(value, timeoutMs) {
  let timer;
  const limit = new Promise((_, reject) => {
    timer = setTimeout(() => reject(new Error('Async work did not settle within ' + timeoutMs + 'ms')), timeoutMs);
  });
  return Promise.race([Promise.resolve(value), limit]).finally(() => clearTimeout(timer));
}

process.once('message', async (request) => {
  const rejections = [];
  process.on('unhandledRejection', (reason) => {
    rejections.push(reason);
  });

  let reply = { ok: true };
  try {
    const context = vm.createContext({ assert, console });
    for (const unit of request.units) {
      const result = vm.runInContext(unit.source, context, { filename: unit.name, timeout: request.timeoutMs });
      if (result !== null && typeof result === 'object' && typeof result.then === 'function') {
        await settleWithin(result, request.timeoutMs);
      }
      // Let rejections left unhandled by this unit surface before the next one runs.
      await new Promise((resolve) => setImmediate(resolve));
      if (rejections.length > 0) throw rejections[0];
    }
  } catch (err) {
    reply = { ok: false, error: describeThrown(err) };
  }
  process.send(reply, () => process.exit(0));
});
`;
