import { afterEach, describe, it, expect, vi } from 'vitest';
import { Action, consoleAppender, LogLevel, setAppender } from '@chainlist/log';
import { CHECK_INVARIANTS, debugConfig, LinkedList, verifyChain } from '../src/index.js';
import { chain } from '../src/symbols.js';

vi.mock('esm-env', () => ({ DEV: true, BROWSER: false, NODE: true }));

describe('verifyChain', () => {

    it('accepts a sound list', () => {
        expect(verifyChain(LinkedList.from([1, 2, 3]))).toBeUndefined();
    });

    it('catches a wrong size', () => {
        const list = LinkedList.from([1, 2, 3]);
        list[chain].size = 5;
        expect(verifyChain(list)).toBe('forward walk counts 3 nodes, size is 5');
    });

    it('catches a broken back link', () => {
        const list = LinkedList.from([1, 2, 3]);
        const { head } = list[chain];
        if (head?.n) {
            head.n.p = undefined;
        }
        expect(verifyChain(list)).toBe('node 0 is not the previous node of its successor');
    });

    it('catches a dangling head', () => {
        const list = LinkedList.from([1]);
        list[chain].head = undefined;
        expect(verifyChain(list)).toBe('size 1 disagrees with head/tail presence');
    });
});

describe('logging', () => {

    afterEach(() => {
        debugConfig(0);
        setAppender(consoleAppender);
    });

    it('logs refused operations', () => {
        const appender = vi.fn();
        setAppender(appender);
        new LinkedList<number>().get(5);
        expect(appender).toHaveBeenCalledWith(expect.objectContaining({
            action: Action.update,
            loglevel: LogLevel.verbose,
            message: 'get rejected: IndexOutOfRange',
            tag: 'list'
        }));
    });

    it('uses the configured tag', () => {
        const appender = vi.fn();
        setAppender(appender);
        new LinkedList<number>({ tag: 'queue' }).removeFirst();
        expect(appender).toHaveBeenCalledWith(expect.objectContaining({
            message: 'removeFirst rejected: EmptyCollection',
            tag: 'queue'
        }));
    });

    it('logs sorting', () => {
        const appender = vi.fn();
        setAppender(appender);
        LinkedList.from([3, 1, 2]).sort((a, b) => a - b);
        expect(appender.mock.calls.map(([message]) => [message.action, message.message])).toEqual([
            [Action.start, 'sorting 3 elements'],
            [Action.success, 'sorted 3 elements']
        ]);
    });

    it('stays quiet when checks pass', () => {
        debugConfig(CHECK_INVARIANTS);
        const appender = vi.fn();
        setAppender(appender);
        const list = LinkedList.from([1, 2]);
        list.add(3);
        list.reverse();
        list.removeAt(1);
        expect(appender).not.toHaveBeenCalled();
    });

    it('reports a broken chain when checks are enabled', () => {
        debugConfig(CHECK_INVARIANTS);
        const appender = vi.fn();
        setAppender(appender);
        const list = LinkedList.from([1, 2, 3]);
        list[chain].size = 5;
        list.add(4);
        expect(appender).toHaveBeenCalledWith(expect.objectContaining({
            action: Action.fail,
            loglevel: LogLevel.error,
            message: 'addLast broke the list: forward walk counts 4 nodes, size is 6'
        }));
    });

    it('does not check when disabled', () => {
        const appender = vi.fn();
        setAppender(appender);
        const list = LinkedList.from([1, 2, 3]);
        list[chain].size = 5;
        list.add(4);
        expect(appender).not.toHaveBeenCalled();
    });
});
