export interface IDatabaseConfig {
  url?: string;
  host: string;
  port: number;
  name: string;
  username: string;
  password: string;
  synchronize: boolean;
  logging: boolean;
  ssl: boolean;
}
