import { registerAs } from '@nestjs/config';

export interface AppConfig {
  port: number;
  apiSecretKey: string | undefined;
  bodyLimit: string;
}

export const appConfig = registerAs('app', (): AppConfig => ({
  port: parseInt(process.env.PORT || '3000', 10),
  apiSecretKey: process.env.API_SECRET_KEY || undefined,
  bodyLimit: process.env.BODY_LIMIT || '10mb',
}));
