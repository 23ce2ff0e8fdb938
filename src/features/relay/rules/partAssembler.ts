import type { PartDeltaEvent, PartSnapshotEvent } from '../domain/RelayEvent.js';
import type { RegistryEntry } from '../domain/RegistryEntry.js';
import { STATUS_PROCESSING, STATUS_RUNNING_TOOL, STATUS_THINKING } from './displayComposer.js';

/**
 * Layer A: Rules - 把 part 级事件应用到 entry 的组装状态上
 * 返回值表示 accumulatedText 或 statusLine 是否发生变化 (变化才需要尝试投递)
 */

type AssemblyState = Pick<RegistryEntry, 'accumulatedText' | 'statusLine' | 'activeTextPartId' | 'auxiliaryPartIds'>;

export function applyPartSnapshot(state: AssemblyState, event: PartSnapshotEvent): boolean {
    const before = { text: state.accumulatedText, status: state.statusLine };

    switch (event.partKind) {
        case 'text':
            // 同一个 part ID 不能既是可见文本又是辅助 part
            state.auxiliaryPartIds.delete(event.partId);
            state.activeTextPartId = event.partId;
            if (event.text) {
                state.accumulatedText = event.text;
            }
            state.statusLine = '';
            break;
        case 'reasoning':
            state.auxiliaryPartIds.add(event.partId);
            if (state.activeTextPartId === event.partId) {
                state.activeTextPartId = '';
            }
            state.statusLine = event.text ? '' : STATUS_THINKING;
            break;
        case 'step-start':
            state.statusLine = STATUS_PROCESSING;
            break;
        case 'tool-invocation':
            state.statusLine = STATUS_RUNNING_TOOL;
            break;
        case 'step-finish':
        case 'tool-result':
            state.statusLine = '';
            break;
        case 'other':
            break;
    }

    return state.accumulatedText !== before.text || state.statusLine !== before.status;
}

export function applyPartDelta(state: AssemblyState, event: PartDeltaEvent): boolean {
    if (event.field !== 'text') return false;
    // reasoning 内容不进入用户可见的文本
    if (state.auxiliaryPartIds.has(event.partId)) return false;

    const before = { text: state.accumulatedText, status: state.statusLine };
    state.accumulatedText += event.delta;
    state.statusLine = '';

    return state.accumulatedText !== before.text || state.statusLine !== before.status;
}
