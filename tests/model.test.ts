/**
 * Tests for frames, awaitables and graph nodes
 */

import { describe, it, expect } from 'vitest';
import {
  AwaitableNode,
  AwaiterSet,
  Deferred,
  ErrorNode,
  FrameNode,
  Gate,
  StackFrame,
  Task,
  captureFrames,
  isSchedulableUnit,
  frameChain,
  framesOf,
  getTrace
} from '../src/index.js';

describe('Frames', () => {
  it('should build a chain innermost first', () => {
    const frame = frameChain('inner', 'middle', 'outer');

    expect(framesOf(frame).map(String)).toEqual(['inner', 'middle', 'outer']);
    expect(frameChain()).toBeNull();
    expect(framesOf(null)).toEqual([]);
  });

  it('should include the location in the label', () => {
    expect(String(new StackFrame('handler', null, 'app.ts:10:3'))).toBe('handler (app.ts:10:3)');
    expect(String(new StackFrame('handler'))).toBe('handler');
  });

  it('should capture the calling function as the innermost frame', () => {
    function probe() {
      return captureFrames();
    }

    const frame = probe();

    expect(frame?.name).toBe('probe');
    expect(frame?.caller).not.toBeNull();
  });

  it('should skip frames above the given function', () => {
    function outer() {
      return middle();
    }
    function middle() {
      return inner();
    }
    function inner() {
      return captureFrames(middle);
    }

    expect(outer()?.name).toBe('outer');
  });

  it('should restore stack trace settings after capturing', () => {
    const prepare = Error.prepareStackTrace;
    const limit = Error.stackTraceLimit;

    captureFrames();

    expect(Error.prepareStackTrace).toBe(prepare);
    expect(Error.stackTraceLimit).toBe(limit);
  });
});

describe('Awaitables', () => {
  it('should expose awaiters as a live view', () => {
    const set = new AwaiterSet();
    const view = set.view();
    const waiter = new Deferred('waiter');

    set.add(waiter);

    expect(view.has(waiter)).toBe(true);
    expect(set.size).toBe(1);
  });

  it('should stop recording awaiters once frozen', () => {
    const set = new AwaiterSet();
    set.freeze();

    set.add(new Deferred('late'));

    expect(set.isFrozen).toBe(true);
    expect(set.size).toBe(0);
  });

  it('should freeze a deferred result when it resolves', () => {
    const deferred = new Deferred<number>('answer');
    const early = new Task('early');
    deferred.addAwaiter(early);

    deferred.resolve(42);
    deferred.resolve(7);
    deferred.addAwaiter(new Task('late'));

    expect(deferred.done).toBe(true);
    expect(deferred.value).toBe(42);
    expect([...deferred.getAwaiters()]).toEqual([early]);
  });

  it('should open a gate after all parties arrive', () => {
    const gate = new Gate('barrier', 2);

    expect(gate.arrive()).toBe(false);
    expect(gate.open).toBe(false);
    expect(gate.arrive()).toBe(true);
    expect(gate.open).toBe(true);
    expect(gate.arrive()).toBe(false);
    expect(String(gate)).toBe('Gate<barrier, parties=2>');
  });

  it('should reject a gate without parties', () => {
    expect(() => new Gate('empty', 0)).toThrow(RangeError);
  });

  it('should expand a task into its frames followed by the task', () => {
    const frame = frameChain('leaf', 'body', 'scheduler');
    if (frame === null) throw new Error('empty chain');
    const body = frame.caller;
    if (body === null) throw new Error('short chain');
    const task = new Task('worker').suspendAt(frame, body);

    const { tail, head } = task.makeAsyncGraphNodes();

    expect(head.kind).toBe('frame');
    expect(tail.kind).toBe('awaitable');
    expect(getTrace(head)).toEqual(['leaf', 'body', 'Task<worker>']);
    expect(task.getEntryFrame()).toBe(body);
  });

  it('should take frames to the end of the chain when the entry frame is not on it', () => {
    const frame = frameChain('leaf', 'body');
    if (frame === null) throw new Error('empty chain');
    const task = new Task('stray').suspendAt(frame, new StackFrame('elsewhere'));

    expect(getTrace(task.makeAsyncGraphNodes().head)).toEqual(['leaf', 'body', 'Task<stray>']);
  });

  it('should tell schedulable units from other awaitables', () => {
    expect(isSchedulableUnit(new Task('unit'))).toBe(true);
    expect(isSchedulableUnit(new Deferred('value'))).toBe(false);
    expect(isSchedulableUnit(new Gate('barrier', 1))).toBe(false);
  });

  it('should expand a task without frames into a single node', () => {
    const { tail, head } = new Task('pending').makeAsyncGraphNodes();

    expect(head).toBe(tail);
    expect(String(head)).toBe('Task<pending>');
  });

  it('should freeze a task on completion', () => {
    const task = new Task('finished');
    task.complete();
    task.addAwaiter(new Deferred('late'));

    expect(task.done).toBe(true);
    expect(task.getAwaiters().size).toBe(0);
  });
});

describe('Nodes', () => {
  it('should keep nodes with equal labels distinct', () => {
    const frame = new StackFrame('same');
    const a = new FrameNode(frame);
    const b = new FrameNode(frame);
    a.awaitedBy.add(b);

    expect(a).not.toBe(b);
    expect(getTrace(a)).toEqual(['same', 'same']);
  });

  it('should delegate awaiters to the awaitable', () => {
    const deferred = new Deferred('value');
    const node = new AwaitableNode(deferred);
    const waiter = new Task('waiter');

    deferred.addAwaiter(waiter);

    expect(node.getAwaiters().has(waiter)).toBe(true);
    expect(String(node)).toBe('Deferred<value>');
  });

  it('should give every error node its own awaiter set', () => {
    const a = new ErrorNode('a');
    const b = new ErrorNode('b');
    const given = new Set([new Deferred('d')]);

    expect(a.getAwaiters()).not.toBe(b.getAwaiters());
    expect(a.getAwaiters().size).toBe(0);
    expect(new ErrorNode('c', given).getAwaiters()).toBe(given);
  });

  it('should report no awaiters for frame nodes', () => {
    expect(new FrameNode(new StackFrame('f')).getAwaiters().size).toBe(0);
  });
});
