import { Progress, ProgressOutput, binaryPrefix, formatProgressLine } from './progress';

function recordingOutput(): ProgressOutput & { lines: string[]; clears: number } {
  const output = {
    lines: [] as string[],
    clears: 0,
    update(line: string) {
      output.lines.push(line);
    },
    clear() {
      output.clears += 1;
    },
  };
  return output;
}

describe('binaryPrefix', () => {
  it('keeps small values unscaled', () => {
    expect(binaryPrefix(512)).toEqual([512, '']);
  });

  it('scales by powers of 1024', () => {
    expect(binaryPrefix(2048)).toEqual([2, 'Ki']);
    expect(binaryPrefix(3 * 1024 * 1024)).toEqual([3, 'Mi']);
  });
});

describe('formatProgressLine', () => {
  it('renders percentage and bar without byte counts', () => {
    expect(formatProgressLine({ overall: 0.25 }, undefined)).toBe(' 25% [=====               ]');
  });

  it('renders size and rate when known', () => {
    expect(formatProgressLine({ overall: 0.5, bytesDownloaded: 2048 }, 5120)).toBe(
      ' 50%   2.0 KiB at   5.0 KiB/s [==========          ]',
    );
  });
});

describe('Progress', () => {
  it('stays silent during the initial delay', () => {
    const output = recordingOutput();
    const progress = new Progress(0);

    progress.update(100, { overall: 0.1, bytesDownloaded: 1024 }, output);

    expect(output.lines).toEqual([]);
  });

  it('draws with an estimated rate after the delay', () => {
    const output = recordingOutput();
    const progress = new Progress(0);

    progress.update(100, { overall: 0.5, bytesDownloaded: 1024 }, output);
    progress.update(300, { overall: 0.5, bytesDownloaded: 2048 }, output);

    expect(output.lines).toEqual([' 50%   2.0 KiB at   5.0 KiB/s [==========          ]']);
  });

  it('limits the redraw frequency', () => {
    const output = recordingOutput();
    const progress = new Progress(0);

    progress.update(300, { overall: 0.3 }, output);
    progress.update(310, { overall: 0.4 }, output);
    progress.update(340, { overall: 0.6 }, output);

    expect(output.lines).toEqual([' 30% [======              ]', ' 60% [============        ]']);
  });

  it('clears the display when the transfer completes', () => {
    const output = recordingOutput();
    const progress = new Progress(0);

    progress.update(300, { overall: 0.9 }, output);
    progress.update(301, { overall: 1 }, output);

    expect(output.lines).toHaveLength(1);
    expect(output.clears).toBe(1);
  });
});
