import path from 'path';

export const CONFIG_FILENAME = 'card-config.json';

export interface Settings {
  resources: {
    overrideDir: string;
    bundledDir: string;
  };
  server: {
    port: number;
  };
  configFilename: string;
}

export class SettingsService {
  private static instance: SettingsService;
  private config?: Settings;

  private constructor() {}

  static getInstance() {
    if (!SettingsService.instance) {
      SettingsService.instance = new SettingsService();
    }
    return SettingsService.instance;
  }

  load(env: NodeJS.ProcessEnv = process.env): Settings {
    if (this.config) {
      return this.config;
    }
    this.config = {
      resources: {
        overrideDir: path.resolve(env.CARDMAKER_OVERRIDE_DIR ?? process.cwd()),
        // src/ and dist/ both sit one level below the package root, which
        // holds the bundled resources/ tree
        bundledDir: path.resolve(__dirname, '..'),
      },
      server: {
        port: Number(env.PORT ?? 4000),
      },
      configFilename: CONFIG_FILENAME,
    };
    return this.config;
  }
}
