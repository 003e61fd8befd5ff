import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';

export const logger = winston.createLogger({
    level: logLevel,
    silent: process.env.NODE_ENV === 'test',

    format: winston.format.combine(
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss'
        }),

        winston.format.errors({ stack: true }),

        winston.format.colorize({ all: true }),

        winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
            let line = `${timestamp} [${level}]: ${message}`;

            if (Object.keys(meta).length > 0) {
                line += ` ${JSON.stringify(meta)}`;
            }

            if (stack) {
                line += `\n${stack}`;
            }

            return line;
        })
    ),

    transports: [
        // no level of its own, so the level set from settings at boot applies
        new winston.transports.Console()
    ]
});

if (process.env.NODE_ENV === 'production') {
    logger.add(new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error'
    }));

    logger.add(new winston.transports.File({
        filename: 'logs/combined.log'
    }));
}
