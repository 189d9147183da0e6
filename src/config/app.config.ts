// File overview:
// - Purpose: Typed `app` config namespace (api key, runtime environment, docs toggle).
// - Reached from: `ConfigModule.forRoot({ load })` in `AppModule`; injected with `@Inject(appConfig.KEY)`.
// - Env inputs: API_KEY, API_ENV.
import { ConfigType, registerAs } from '@nestjs/config';

// Deployed environments should provide their own key through API_KEY
export const DEFAULT_API_KEY = 'items-api-key';

export enum Environment {
  Production = 'PRODUCTION',
  Test = 'TEST',
  Development = 'DEVELOPMENT',
  Local = 'LOCAL',
}

const ENVIRONMENTS: readonly string[] = Object.values(Environment);

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.includes(value);
}

/** Unknown or missing values fall back to LOCAL. */
export function parseEnvironment(value: string | undefined): Environment {
  return value !== undefined && isEnvironment(value) ? value : Environment.Local;
}

export const appConfig = registerAs('app', () => {
  const environment = parseEnvironment(process.env.API_ENV);
  return {
    apiKey: process.env.API_KEY || DEFAULT_API_KEY,
    environment,
    // API documentation is not served in production
    docsEnabled: environment !== Environment.Production,
  };
});

export type AppConfig = ConfigType<typeof appConfig>;
