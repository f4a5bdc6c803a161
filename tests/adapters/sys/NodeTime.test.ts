import { NodeTime } from '../../../src/adapters/sys/NodeTime';

describe('NodeTime', () => {
  test('now delegates to Date.now', () => {
    const spy = jest.spyOn(Date, 'now').mockReturnValue(1234567890);
    expect(new NodeTime().now()).toBe(1234567890);
    spy.mockRestore();
  });
});
