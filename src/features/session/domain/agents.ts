/**
 * 可选的 OpenCode agent: name -> description
 */
export type AgentCatalog = Map<string, string>;

export function defaultAgents(): AgentCatalog {
    return new Map([
        ['sisyphus', 'General coding'],
        ['oracle', 'Deep analysis'],
    ]);
}

/**
 * 解析 "name:description,name2,..."；缺少描述时用名字本身
 */
export function parseAgents(raw: string): AgentCatalog {
    const agents: AgentCatalog = new Map();
    for (const pair of raw.split(',')) {
        const trimmed = pair.trim();
        if (!trimmed) continue;

        const separator = trimmed.indexOf(':');
        const name = (separator === -1 ? trimmed : trimmed.slice(0, separator)).trim();
        const description = separator === -1 ? name : trimmed.slice(separator + 1).trim();
        if (name) {
            agents.set(name, description);
        }
    }
    return agents;
}

/**
 * 配置为空或解析不出任何 agent 时回退到默认列表
 */
export function resolveAgents(raw: string): AgentCatalog {
    const parsed = parseAgents(raw);
    return parsed.size > 0 ? parsed : defaultAgents();
}
