import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import test from "node:test";

import { KeyReader, isInterrupt } from "../src/keypress.ts";

test("readKey resolves with the next key pressed", async () => {
  const input = new PassThrough();
  const reader = new KeyReader(input);
  const pending = reader.readKey();

  input.write("i");

  assert.deepEqual(await pending, { sequence: "i", name: "i", ctrl: false });
  reader.close();
  assert.equal(input.listenerCount("keypress"), 0);
});

test("readKey reports Ctrl+C as an interrupt", async () => {
  const input = new PassThrough();
  const reader = new KeyReader(input);
  const pending = reader.readKey();

  input.write("\u0003");

  const key = await pending;
  reader.close();
  assert.notEqual(key, null);
  if (key === null) {
    return;
  }
  assert.equal(key.ctrl, true);
  assert.equal(key.name, "c");
  assert.equal(isInterrupt(key), true);
});

test("readKey resolves null when the input ends", async () => {
  const input = new PassThrough();
  const reader = new KeyReader(input);
  const pending = reader.readKey();

  input.end();

  assert.equal(await pending, null);
  reader.close();
});

test("readKey keeps every key of a chunk for later reads", async () => {
  const input = new PassThrough();
  const reader = new KeyReader(input);

  input.write("ab");

  assert.equal((await reader.readKey())?.sequence, "a");
  assert.equal((await reader.readKey())?.sequence, "b");
  reader.close();
});

test("readLine splits input on line ends and treats CRLF as one", async () => {
  const input = new PassThrough();
  const reader = new KeyReader(input);

  input.end("X1\r\n\n2\n");

  assert.equal(await reader.readLine(), "X1");
  assert.equal(await reader.readLine(), "");
  assert.equal(await reader.readLine(), "2");
  assert.equal(await reader.readLine(), null);
  reader.close();
});

test("readLine after readKey continues with the keys that follow", async () => {
  const input = new PassThrough();
  const reader = new KeyReader(input);

  input.end("xx11\n");

  assert.equal((await reader.readKey())?.sequence, "x");
  assert.equal((await reader.readKey())?.sequence, "x");
  assert.equal(await reader.readLine(), "11");
  assert.equal(await reader.readKey(), null);
  reader.close();
});

test("isInterrupt ignores ordinary keys", () => {
  assert.equal(isInterrupt({ sequence: "c", name: "c", ctrl: false }), false);
  assert.equal(isInterrupt({ sequence: " ", name: "space", ctrl: false }), false);
});
