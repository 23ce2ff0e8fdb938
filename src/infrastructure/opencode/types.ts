/**
 * OpenCode REST API 的响应结构 (只声明用到的字段)
 */

export interface HealthResponse {
    healthy: boolean;
    version: string;
}

export interface OpenCodeSession {
    id: string;
    slug?: string;
    title: string;
    projectID?: string;
    directory?: string;
    version?: string;
    summary?: {
        additions: number;
        deletions: number;
        files: number;
    };
    time?: {
        created: number;
        updated: number;
    };
}

export interface ProviderModel {
    id: string;
    name: string;
}

export interface Provider {
    id: string;
    name: string;
    models: Record<string, ProviderModel>;
}

export interface ProviderResponse {
    all: Provider[];
    connected: string[];
}

export interface ApiMessage {
    info: {
        id: string;
        sessionID: string;
        role: string;
        tokens?: {
            total?: number;
            input?: number;
            output?: number;
        };
        cost?: number;
        finish?: string;
    };
    parts: Array<{
        type: string;
        text?: string;
    }>;
}

export interface SuccessResponse {
    success: boolean;
}
