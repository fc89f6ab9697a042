/**
 * Retrieval, summarization and breaker settings from environment variables
 */

export interface SearchConfig {
    rrfK: number;
    searchTimeoutMs: number;
    branchTimeoutMs: number;
    candidateMultiplier: number;
    llmTimeoutMs: number;
    summaryContextSize: number;
    breakerFailureThreshold: number;
    breakerCooldownMs: number;
}

export function readSearchConfig(env: NodeJS.ProcessEnv = process.env): SearchConfig {
    const searchTimeoutMs = parseInt(env.SEARCH_TIMEOUT_MS || '800', 10);

    return {
        rrfK: parseFloat(env.RRF_K || '60'),
        searchTimeoutMs,
        branchTimeoutMs: env.SEARCH_BRANCH_TIMEOUT_MS ? parseInt(env.SEARCH_BRANCH_TIMEOUT_MS, 10) : searchTimeoutMs,
        candidateMultiplier: parseInt(env.SEARCH_CANDIDATE_MULTIPLIER || '2', 10),
        llmTimeoutMs: parseInt(env.LLM_TIMEOUT_MS || '2000', 10),
        summaryContextSize: parseInt(env.SUMMARY_CONTEXT_SIZE || '5', 10),
        breakerFailureThreshold: parseInt(env.BREAKER_FAILURE_THRESHOLD || '3', 10),
        breakerCooldownMs: parseInt(env.BREAKER_COOLDOWN_MS || '30000', 10),
    };
}

export const searchConfig = readSearchConfig();

/**
 * Validates search configuration
 * Throws error if configuration is invalid
 */
export function validateSearchConfig(config: SearchConfig = readSearchConfig()): void {
    if (!Number.isFinite(config.rrfK) || config.rrfK <= 0) {
        throw new Error('RRF_K must be a positive number');
    }

    if (!(config.searchTimeoutMs >= 50 && config.searchTimeoutMs <= 60000)) {
        throw new Error('SEARCH_TIMEOUT_MS must be between 50 and 60000');
    }

    if (!(config.branchTimeoutMs >= 1 && config.branchTimeoutMs <= config.searchTimeoutMs)) {
        throw new Error('SEARCH_BRANCH_TIMEOUT_MS must be positive and must not exceed SEARCH_TIMEOUT_MS');
    }

    if (!(config.candidateMultiplier >= 1 && config.candidateMultiplier <= 10)) {
        throw new Error('SEARCH_CANDIDATE_MULTIPLIER must be between 1 and 10');
    }

    if (!(config.llmTimeoutMs >= 100 && config.llmTimeoutMs <= 120000)) {
        throw new Error('LLM_TIMEOUT_MS must be between 100 and 120000');
    }

    if (!(config.summaryContextSize >= 1 && config.summaryContextSize <= 10)) {
        throw new Error('SUMMARY_CONTEXT_SIZE must be between 1 and 10');
    }

    if (!(config.breakerFailureThreshold >= 1 && config.breakerFailureThreshold <= 100)) {
        throw new Error('BREAKER_FAILURE_THRESHOLD must be between 1 and 100');
    }

    if (!(config.breakerCooldownMs >= 0 && config.breakerCooldownMs <= 3600000)) {
        throw new Error('BREAKER_COOLDOWN_MS must be between 0 and 3600000');
    }
}
