import { NodeTime } from '../../../src/adapters/sys/NodeTime';

describe('NodeTime', () => {
  const time = new NodeTime('en-US');

  test('now delegates to Date.now', () => {
    const spy = jest.spyOn(Date, 'now').mockReturnValue(1234567890);
    expect(time.now()).toBe(1234567890);
    spy.mockRestore();
  });

  test('toLocaleTimeString formats the given epoch in the configured locale', () => {
    const epoch = Date.UTC(2024, 0, 1, 15, 4, 5);
    expect(time.toLocaleTimeString(epoch)).toBe(new Date(epoch).toLocaleTimeString('en-US'));
  });
});
