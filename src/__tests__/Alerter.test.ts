import { Alerter, BELL } from '../alert/Alerter';

describe('Alerter', () => {
  let stream: { write: jest.Mock };
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    stream = { write: jest.fn(() => true) };
    sleep = jest.fn((_ms: number) => Promise.resolve());
  });

  it('should ring the bell once per pulse with the spacing after each', async () => {
    const alerter = new Alerter({ stream, sleep, spacing: 300 });

    await alerter.pulse(3);

    expect(stream.write.mock.calls).toEqual([[BELL], [BELL], [BELL]]);
    expect(sleep.mock.calls).toEqual([[300], [300], [300]]);
  });

  it('should stay silent when quiet', async () => {
    const alerter = new Alerter({ quiet: true, stream, sleep });

    await alerter.pulse(3);

    expect(stream.write).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });
});
