import { z } from 'zod';
import { LogLevel } from '../logging/logger';

export type TransportMode = 'stdio' | 'http';

/**
 * Application configuration interface
 */
export interface AppConfig {
	server: ServerConfig;
	transport: TransportConfig;
	logging: LoggingConfig;
}

/**
 * Identity reported in the MCP handshake and by `health_check`
 */
export interface ServerConfig {
	name: string;
	version: string;
}

export interface TransportConfig {
	mode: TransportMode;
	host: string;
	port: number;
	/** Route of the Streamable HTTP endpoint */
	path: string;
}

export interface LoggingConfig {
	level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
	enableStructuredLogging: boolean;
}

/**
 * Default application configuration
 */
export const DEFAULT_APP_CONFIG: AppConfig = {
	server: {
		name: 'lyrical-mcp',
		version: '1.0.0',
	},
	transport: {
		mode: 'stdio',
		host: '127.0.0.1',
		port: 8000,
		path: '/mcp',
	},
	logging: {
		level: 'INFO',
		enableStructuredLogging: true,
	},
};

const booleanFlag = z
	.enum(['true', 'false', '1', '0'])
	.transform((value) => value === 'true' || value === '1');

const environmentSchema = z.object({
	MCP_SERVER_NAME: z.string().min(1).optional(),
	MCP_SERVER_VERSION: z.string().min(1).optional(),
	MCP_TRANSPORT: z.enum(['stdio', 'http']).optional(),
	MCP_HTTP_HOST: z.string().min(1).optional(),
	MCP_HTTP_PORT: z.coerce.number().int().min(0).max(65535).optional(),
	MCP_HTTP_PATH: z.string().startsWith('/').optional(),
	LOG_LEVEL: z
		.string()
		.transform((value) => value.toUpperCase())
		.pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']))
		.optional(),
	LOG_STRUCTURED: booleanFlag.optional(),
});

const LOG_LEVELS: Record<LoggingConfig['level'], LogLevel> = {
	DEBUG: LogLevel.DEBUG,
	INFO: LogLevel.INFO,
	WARN: LogLevel.WARN,
	ERROR: LogLevel.ERROR,
};

type ConfigOverrides = {
	[K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

/**
 * Configuration manager for centralized configuration access
 */
export class ConfigManager {
	private config: AppConfig;

	constructor(customConfig?: ConfigOverrides) {
		this.config = this.mergeConfig(DEFAULT_APP_CONFIG, customConfig);
	}

	getConfig(): AppConfig {
		return {
			server: this.getServerConfig(),
			transport: this.getTransportConfig(),
			logging: this.getLoggingConfig(),
		};
	}

	getServerConfig(): ServerConfig {
		return { ...this.config.server };
	}

	getTransportConfig(): TransportConfig {
		return { ...this.config.transport };
	}

	getLoggingConfig(): LoggingConfig {
		return { ...this.config.logging };
	}

	getLogLevel(): LogLevel {
		return LOG_LEVELS[this.config.logging.level];
	}

	/**
	 * Update configuration at runtime (for testing or dynamic config)
	 */
	updateConfig(updates: ConfigOverrides): void {
		this.config = this.mergeConfig(this.config, updates);
	}

	/**
	 * Create configuration from environment variables.
	 * Throws naming the variable when a value is present but invalid.
	 */
	static fromEnvironment(env: Record<string, string | undefined> = {}): ConfigManager {
		const parsed = environmentSchema.safeParse(env);
		if (!parsed.success) {
			const details = parsed.error.issues
				.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ');
			throw new Error(`Invalid environment configuration (${details})`);
		}

		const vars = parsed.data;
		const defaults = DEFAULT_APP_CONFIG;
		return new ConfigManager({
			server: {
				name: vars.MCP_SERVER_NAME ?? defaults.server.name,
				version: vars.MCP_SERVER_VERSION ?? defaults.server.version,
			},
			transport: {
				mode: vars.MCP_TRANSPORT ?? defaults.transport.mode,
				host: vars.MCP_HTTP_HOST ?? defaults.transport.host,
				port: vars.MCP_HTTP_PORT ?? defaults.transport.port,
				path: vars.MCP_HTTP_PATH ?? defaults.transport.path,
			},
			logging: {
				level: vars.LOG_LEVEL ?? defaults.logging.level,
				enableStructuredLogging: vars.LOG_STRUCTURED ?? defaults.logging.enableStructuredLogging,
			},
		});
	}

	/**
	 * Shallow merge per section
	 */
	private mergeConfig(base: AppConfig, override?: ConfigOverrides): AppConfig {
		if (!override) return base;

		return {
			server: { ...base.server, ...override.server },
			transport: { ...base.transport, ...override.transport },
			logging: { ...base.logging, ...override.logging },
		};
	}
}

