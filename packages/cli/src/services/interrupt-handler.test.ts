import { EventEmitter } from 'events';
import { installInterruptHandlers } from './interrupt-handler';

describe('installInterruptHandlers', () => {
  function setup() {
    const target = new EventEmitter();
    const controller = new AbortController();
    const writes: string[] = [];
    const onForceExit = jest.fn();
    const remove = installInterruptHandlers(controller, {
      target,
      stderr: { write: (chunk: string) => writes.push(chunk) },
      onForceExit,
    });
    return { target, controller, writes, onForceExit, remove };
  }

  it('should abort on the first SIGINT without exiting', () => {
    const { target, controller, writes, onForceExit } = setup();

    target.emit('SIGINT', 'SIGINT');

    expect(controller.signal.aborted).toBe(true);
    expect(onForceExit).not.toHaveBeenCalled();
    expect(writes).toEqual(['\nReceived SIGINT; finishing the current test. Send it again to exit immediately.\n']);
  });

  it('should force the exit on a second signal of either kind', () => {
    const { target, onForceExit } = setup();

    target.emit('SIGTERM', 'SIGTERM');
    target.emit('SIGINT', 'SIGINT');

    expect(onForceExit).toHaveBeenCalledTimes(1);
  });

  it('should stop listening once removed', () => {
    const { target, controller, remove } = setup();

    remove();

    expect(target.listenerCount('SIGINT')).toBe(0);
    expect(target.listenerCount('SIGTERM')).toBe(0);
    expect(controller.signal.aborted).toBe(false);
  });
});
