import { describe, it, expect, jest, afterEach } from '@jest/globals';
import * as cliProgress from 'cli-progress';
import { ProgressReporter } from './ProgressReporter';

describe('ProgressReporter', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should start the bar on the first event and count skipped segments', () => {
        const start = jest.spyOn(cliProgress.SingleBar.prototype, 'start').mockImplementation(() => undefined);
        const update = jest.spyOn(cliProgress.SingleBar.prototype, 'update').mockImplementation(() => undefined);
        const stop = jest.spyOn(cliProgress.SingleBar.prototype, 'stop').mockImplementation(() => undefined);
        const reporter = new ProgressReporter(true);

        reporter.callback({ completed: 1, total: 3, fileName: '1.ts', skipped: true });
        reporter.callback({ completed: 2, total: 3, fileName: '2.ts', skipped: false });
        reporter.callback({ completed: 3, total: 3, fileName: '3.ts', skipped: true });
        reporter.stop();

        expect(start).toHaveBeenCalledTimes(1);
        expect(start).toHaveBeenCalledWith(3, 0, { skipped: 0 });
        expect(update).toHaveBeenLastCalledWith(3, { skipped: 2 });
        expect(stop).toHaveBeenCalledTimes(1);
    });

    it('should draw nothing when disabled', () => {
        const start = jest.spyOn(cliProgress.SingleBar.prototype, 'start').mockImplementation(() => undefined);
        const reporter = new ProgressReporter(false);

        reporter.callback({ completed: 1, total: 1, fileName: '1.ts', skipped: false });
        reporter.stop();

        expect(start).not.toHaveBeenCalled();
    });
});
