import { PeriodicTask } from './periodic-task';

describe('PeriodicTask', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should reject a non-positive interval', () => {
    const job = jest.fn().mockResolvedValue(undefined);

    expect(() => new PeriodicTask(job, { intervalMs: 0 })).toThrow(RangeError);
    expect(() => new PeriodicTask(job, { intervalMs: -5 })).toThrow(RangeError);
  });

  it('should reject a negative or non-numeric retry delay', () => {
    const job = jest.fn().mockResolvedValue(undefined);

    expect(() => new PeriodicTask(job, { intervalMs: 1000, retryDelayMs: -1 })).toThrow(RangeError);
    expect(() => new PeriodicTask(job, { intervalMs: 1000, retryDelayMs: Number.NaN })).toThrow(RangeError);
    expect(new PeriodicTask(job, { intervalMs: 1000, retryDelayMs: 0 }).retryDelayMs).toBe(0);
  });

  it('should validate a new cadence given on restart', () => {
    const task = new PeriodicTask(jest.fn().mockResolvedValue(undefined), { intervalMs: 1000 });

    expect(() => task.start({ retryDelayMs: -5 })).toThrow(RangeError);
    expect(() => task.start({ intervalMs: 0 })).toThrow(RangeError);
    expect(task.running).toBe(false);
  });

  it('should run immediately and then once per interval', async () => {
    const job = jest.fn().mockResolvedValue(undefined);
    const task = new PeriodicTask(job, { intervalMs: 1000 });

    task.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(job).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(999);
    expect(job).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(job).toHaveBeenCalledTimes(2);

    await task.stop();
  });

  it('should wait a full interval first when runImmediately is false', async () => {
    const job = jest.fn().mockResolvedValue(undefined);
    const task = new PeriodicTask(job, { intervalMs: 1000, runImmediately: false });

    task.start();
    await jest.advanceTimersByTimeAsync(500);
    expect(job).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(500);
    expect(job).toHaveBeenCalledTimes(1);

    await task.stop();
  });

  it('should report failures and retry after the retry delay', async () => {
    const failure = new Error('boom');
    const job = jest.fn().mockRejectedValueOnce(failure).mockResolvedValue(undefined);
    const onError = jest.fn();
    const task = new PeriodicTask(job, { intervalMs: 1000, retryDelayMs: 100, onError });

    task.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(onError).toHaveBeenCalledWith(failure);

    await jest.advanceTimersByTimeAsync(100);
    expect(job).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(999);
    expect(job).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(1);
    expect(job).toHaveBeenCalledTimes(3);
    expect(onError).toHaveBeenCalledTimes(1);

    await task.stop();
  });

  it('should log failures when no error handler is given', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('boom');
    const task = new PeriodicTask(jest.fn().mockRejectedValue(failure), { intervalMs: 1000 });

    task.start();
    await jest.advanceTimersByTimeAsync(0);
    await task.stop();

    expect(errorSpy).toHaveBeenCalledWith('[PeriodicTask] Run failed:', failure);
    errorSpy.mockRestore();
  });

  it('should not run again after stop', async () => {
    const job = jest.fn().mockResolvedValue(undefined);
    const task = new PeriodicTask(job, { intervalMs: 1000 });

    task.start();
    await jest.advanceTimersByTimeAsync(0);
    await task.stop();

    expect(task.running).toBe(false);
    await jest.advanceTimersByTimeAsync(5000);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it('should wait for an in-flight run when stopping', async () => {
    let finishRun: () => void = () => undefined;
    const job = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          finishRun = resolve;
        })
    );
    const task = new PeriodicTask(job, { intervalMs: 1000 });

    task.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(job).toHaveBeenCalledTimes(1);

    let stopped = false;
    const stopping = task.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    finishRun();
    await stopping;
    expect(stopped).toBe(true);

    await jest.advanceTimersByTimeAsync(5000);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it('should resume after being restarted', async () => {
    const job = jest.fn().mockResolvedValue(undefined);
    const task = new PeriodicTask(job, { intervalMs: 1000 });

    task.start();
    await jest.advanceTimersByTimeAsync(0);
    await task.stop();

    task.start();
    expect(task.running).toBe(true);
    await jest.advanceTimersByTimeAsync(0);
    expect(job).toHaveBeenCalledTimes(2);

    await task.stop();
  });

  it('should ignore start while already running', async () => {
    const job = jest.fn().mockResolvedValue(undefined);
    const task = new PeriodicTask(job, { intervalMs: 1000 });

    task.start();
    task.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(job).toHaveBeenCalledTimes(1);

    await task.stop();
  });

  it('should restart with a new interval', async () => {
    const job = jest.fn().mockResolvedValue(undefined);
    const task = new PeriodicTask(job, { intervalMs: 1000 });

    task.start();
    await jest.advanceTimersByTimeAsync(0);
    await task.stop();

    task.start({ intervalMs: 500 });
    expect(task.intervalMs).toBe(500);
    await jest.advanceTimersByTimeAsync(0);
    expect(job).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(500);
    expect(job).toHaveBeenCalledTimes(3);

    await task.stop();
  });
});
