export type NodeEnv = 'development' | 'production' | 'test';

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  apiPrefix: string;
  logLevel: string;
};
