import Joi from 'joi';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Settings {
    port: number;
    logLevel: LogLevel;
    nodeEnv: 'development' | 'production' | 'test';
    dataFile: string;
    /** Fixed instant ages are measured against; unset means "now" at load time. */
    evaluationDate?: Date;
    topAlertsLimit: number;
}

const settingsSchema = Joi.object({
    PORT: Joi.number().port().default(3000),
    LOG_LEVEL: Joi.string().valid(...LOG_LEVELS).default('info'),
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    DATA_FILE: Joi.string().trim().min(1).default('data.csv'),
    EVALUATION_DATE: Joi.date().iso().optional(),
    TOP_ALERTS_LIMIT: Joi.number().integer().min(1).max(1000).default(20)
}).unknown(true);

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
    const { error, value } = settingsSchema.validate(env, { convert: true });

    if (error) {
        throw new ConfigurationError(`Invalid environment configuration: ${error.details[0].message}`);
    }

    return {
        port: value.PORT,
        logLevel: value.LOG_LEVEL,
        nodeEnv: value.NODE_ENV,
        dataFile: value.DATA_FILE,
        evaluationDate: value.EVALUATION_DATE,
        topAlertsLimit: value.TOP_ALERTS_LIMIT
    };
};
