import type { MessageSink } from '../../../../core/ports/MessageSink.js';

export type SinkCall =
    | { op: 'create'; chatId: string; text: string }
    | { op: 'update'; chatId: string; messageId: number; text: string };

/**
 * 记录调用的 MessageSink；gate 未 resolve 前投递保持进行中
 */
export class FakeSink implements MessageSink {
    calls: SinkCall[] = [];
    nextMessageId = 500;
    failure: Error | null = null;
    gate: Promise<void> | null = null;

    async create(chatId: string, text: string): Promise<number> {
        this.calls.push({ op: 'create', chatId, text });
        await this.settle();
        return this.nextMessageId++;
    }

    async update(chatId: string, messageId: number, text: string): Promise<void> {
        this.calls.push({ op: 'update', chatId, messageId, text });
        await this.settle();
    }

    texts(): string[] {
        return this.calls.map((call) => call.text);
    }

    private async settle(): Promise<void> {
        if (this.gate) await this.gate;
        if (this.failure) throw this.failure;
    }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
    let release: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
        release = resolve;
    });
    return { promise, resolve: () => release() };
}
