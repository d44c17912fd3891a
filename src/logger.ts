import winston from 'winston';

/**
 * Creates a winston logger tagged with the module name.
 * Colorized console lines in development, JSON lines when NODE_ENV=production.
 * LOG_LEVEL=silent mutes every transport.
 */
export function createLogger(moduleName: string) {
	const { combine, timestamp, printf, colorize, json } = winston.format;
	const devFmt = combine(
		colorize(),
		timestamp(),
		printf((info) => {
			const { level, message, timestamp: ts, module: _module, ...meta } = info;
			const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
			return `[${String(ts)}] ${level} ${moduleName}: ${String(message)}${extra}`;
		})
	);
	const level = process.env.LOG_LEVEL || 'info';
	return winston.createLogger({
		level: level === 'silent' ? 'error' : level,
		silent: level === 'silent',
		format: process.env.NODE_ENV === 'production' ? combine(timestamp(), json()) : devFmt,
		defaultMeta: { module: moduleName },
		transports: [new winston.transports.Console()]
	});
}
