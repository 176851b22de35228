import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Structured data comes first, message second, matching pino's call shape.
 */
export interface ILogger {
    info(data: object, message: string): void;
    error(data: object, message: string): void;
    warn(data: object, message: string): void;
    debug(data: object, message: string): void;
}

export const SERVICE_NAME = 'interview-assessment';

/**
 * Logger Configuration
 *
 * Every line carries the service name. The pipeline logs each run's start,
 * outcome and failing state; transcription logs the job id and poll count;
 * model calls log prompt and reply lengths, never their contents.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    base: { service: SERVICE_NAME },
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});
