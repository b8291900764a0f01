import configSchema from './schema';

export type DatabaseConfig =
    | { connectionString: string }
    | { host: string; port: number; user?: string; password?: string; database: string };

export type AppConfig = {
    database: DatabaseConfig;
};

type EnvValues = {
    DATABASE_URL?: string;
    DB_HOST: string;
    DB_PORT: number;
    DB_USER?: string;
    DB_PASSWORD?: string;
    DB_NAME?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const { error, value } = configSchema.validate(env);
    if (error) {
        throw new Error(`Invalid configuration: ${error.message}`);
    }
    const v: EnvValues = value;
    if (v.DATABASE_URL) {
        return { database: { connectionString: v.DATABASE_URL } };
    }
    return {
        database: {
            host: v.DB_HOST,
            port: v.DB_PORT,
            user: v.DB_USER,
            password: v.DB_PASSWORD,
            // the schema's or() guarantees DB_NAME when DATABASE_URL is absent
            database: v.DB_NAME ?? '',
        },
    };
}
