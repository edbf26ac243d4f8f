export type DatabaseConfig = {
  path: string;
  dropSchema: boolean;
  seed: boolean;
};
