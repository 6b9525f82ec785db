import * as cliProgress from 'cli-progress';
import { ProgressCallback, SegmentProgress } from '../../domain/entities/DownloadResult';

/**
 * Terminal progress bar fed by segment progress events.
 * The bar starts on the first event, once the total is known.
 */
export class ProgressReporter {
    private bar: cliProgress.SingleBar | null = null;
    private skipped = 0;

    constructor(private readonly enabled: boolean = true) {}

    get callback(): ProgressCallback {
        return (progress: SegmentProgress) => this.update(progress);
    }

    update(progress: SegmentProgress): void {
        if (progress.skipped) {
            this.skipped++;
        }
        if (!this.enabled) {
            return;
        }

        if (!this.bar) {
            this.bar = new cliProgress.SingleBar({
                format: '    [{bar}] {percentage}% | {value}/{total} | skipped {skipped}',
                barCompleteChar: '=',
                barIncompleteChar: '-',
                hideCursor: true,
                barsize: 20
            });
            this.bar.start(progress.total, 0, { skipped: 0 });
        }

        this.bar.update(progress.completed, { skipped: this.skipped });
    }

    stop(): void {
        this.bar?.stop();
        this.bar = null;
    }
}
