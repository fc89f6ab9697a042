import { Logger, type ILogObj } from 'tslog';

const LOG_LEVELS: Record<string, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
};

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const logger = new Logger<ILogObj>({
    name: 'hybrid-retrieval',
    minLevel: LOG_LEVELS[process.env.LOG_LEVEL ?? 'info'] ?? LOG_LEVELS.info,
    type: isTest ? 'hidden' : process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
    prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
});

export default logger;
