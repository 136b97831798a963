import { EventEmitter } from 'events';
import type { RunSummary, TaskStatus } from './types';

export interface CrawlProgressData {
    current: number;
    target: number;
    itemId: string;
    status: TaskStatus;
}

export class CrawlerEventBus extends EventEmitter {
    public readonly events = {
        CRAWL_PROGRESS: 'crawl:progress',
        CRAWL_COMPLETE: 'crawl:complete',
        CRAWL_ERROR: 'crawl:error'
    } as const;

    emitProgress(data: CrawlProgressData): void {
        this.emit(this.events.CRAWL_PROGRESS, data);
    }

    emitComplete(summary: RunSummary): void {
        this.emit(this.events.CRAWL_COMPLETE, summary);
    }

    emitError(error: Error): void {
        this.emit(this.events.CRAWL_ERROR, error);
    }
}

export function createEventBus(): CrawlerEventBus {
    return new CrawlerEventBus();
}

export default new CrawlerEventBus();
