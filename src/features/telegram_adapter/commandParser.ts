export type ParsedCommand = {
    /** 小写、不含 @BotName，例如 "/switch" */
    command: string;
    /** 按空白切分的参数 */
    args: string[];
    /** 指令后的原始文本 (已 trim)，用于 /rename 这类带空格的参数 */
    rest: string;
};

/**
 * "/switch@my_bot abc" -> { command: '/switch', args: ['abc'], rest: 'abc' }
 * 非指令文本返回 null
 */
export function parseCommand(text: string): ParsedCommand | null {
    const trimmed = text.trim();
    if (!trimmed.startsWith('/')) return null;

    const match = /^(\/[^\s@]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(trimmed);
    if (!match) return null;

    const rest = (match[2] ?? '').trim();
    return {
        command: match[1].toLowerCase(),
        args: rest ? rest.split(/\s+/) : [],
        rest,
    };
}

/**
 * "model_openai/gpt-4" 的载荷 -> ["openai", "gpt-4"]；只在第一个 "/" 处切分
 */
export function splitProviderModel(value: string): [string, string] | null {
    const separator = value.indexOf('/');
    if (separator <= 0 || separator === value.length - 1) return null;
    return [value.slice(0, separator), value.slice(separator + 1)];
}
