export const DEFAULT_MAX_MESSAGE_LENGTH = 4000;
export const TRUNCATION_MARKER = '\n\n... (truncated)';
export const COMPLETION_FALLBACK_TEXT = 'Completed';

export const STATUS_THINKING = 'Thinking...';
export const STATUS_PROCESSING = 'Processing...';
export const STATUS_RUNNING_TOOL = 'Running tool...';

/**
 * 截断到上限并追加截断标记；未超限时原样返回
 * 切点落在代理对中间时前移一位，不留下孤立的高位代理
 */
export function truncateForDisplay(text: string, maxLength: number = DEFAULT_MAX_MESSAGE_LENGTH): string {
    if (text.length <= maxLength) return text;
    let cut = maxLength;
    if (cut > 0 && isHighSurrogate(text.charCodeAt(cut - 1))) {
        cut -= 1;
    }
    return text.slice(0, cut) + TRUNCATION_MARKER;
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

/**
 * 组装展示文本：可见文本 + 空行 + 状态行
 * 两者都为空时返回空串 (调用方不投递)
 */
export function composeDisplay(
    accumulatedText: string,
    statusLine: string,
    maxLength: number = DEFAULT_MAX_MESSAGE_LENGTH
): string {
    let display = accumulatedText;
    if (statusLine) {
        display = display ? `${display}\n\n${statusLine}` : statusLine;
    }
    return display ? truncateForDisplay(display, maxLength) : '';
}

/**
 * 完成时的最终文本：不带状态行，空文本用兜底文案替代
 */
export function composeFinalDisplay(accumulatedText: string, maxLength: number = DEFAULT_MAX_MESSAGE_LENGTH): string {
    return truncateForDisplay(accumulatedText || COMPLETION_FALLBACK_TEXT, maxLength);
}
