import test from 'node:test';
import assert from 'node:assert/strict';
import { Transcript, TranscriptError } from '../src/core/transcript';
import { call } from './helpers';

const entry = (callId: string, content = 'ok') => ({ callId, name: 'echo', content, isError: false });

test('a tool round appends the assistant turn and its results together', () => {
  const t = new Transcript();
  t.appendUser('hi');
  t.appendToolRound('working', [call('c1', 'echo'), call('c2', 'echo')], [entry('c1'), entry('c2')]);

  const turns = t.list();
  assert.equal(turns.length, 3);
  assert.deepEqual(turns[1], { role: 'assistant', text: 'working', toolCalls: [call('c1', 'echo'), call('c2', 'echo')] });
  assert.deepEqual(turns[2], { role: 'tool-result', results: [entry('c1'), entry('c2')] });
});

test('a round with a missing result is rejected and leaves the transcript untouched', () => {
  const t = new Transcript();
  t.appendUser('hi');
  assert.throws(() => t.appendToolRound('', [call('c1', 'echo'), call('c2', 'echo')], [entry('c1')]), TranscriptError);
  assert.equal(t.length, 1);
});

test('results out of call order are rejected', () => {
  const t = new Transcript();
  assert.throws(
    () => t.appendToolRound('', [call('c1', 'echo'), call('c2', 'echo')], [entry('c2'), entry('c1')]),
    /tool result 0 answers c2, expected c1/
  );
});

test('duplicate call ids are rejected', () => {
  const t = new Transcript();
  assert.throws(
    () => t.appendToolRound('', [call('c1', 'echo'), call('c1', 'echo')], [entry('c1'), entry('c1')]),
    /duplicate tool call id: c1/
  );
});

test('an empty round is rejected', () => {
  const t = new Transcript();
  assert.throws(() => t.appendToolRound('', [], []), /tool round without tool calls/);
});

test('fork is independent of the original', () => {
  const t = new Transcript();
  t.appendUser('one');
  const copy = t.fork();
  copy.appendReply('two');

  assert.equal(t.length, 1);
  assert.equal(copy.length, 2);
  assert.deepEqual(copy.last(), { role: 'assistant', text: 'two', toolCalls: [] });
});
