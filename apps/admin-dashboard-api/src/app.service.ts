import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from './config/app-config';
import { JsonLogger } from './logging/json-logger.service';

export const COMPONENT_NAME = 'admin-dashboard';
export const COMPONENT_VERSION = '1.0.0';

export interface ManifestEntry {
  path: string;
  label: string;
  icon: string;
}

export interface ManifestRoute {
  /** Host route, relative to where the host mounts the component */
  path: string;
  /** UI spec endpoint that renders the route */
  ui: string;
}

export interface ComponentManifest {
  name: string;
  version: string;
  description: string;
  nav: ManifestEntry[];
  routes: ManifestRoute[];
  dependencies: { modules: string[] };
}

@Injectable()
export class AppService {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly logger: JsonLogger
  ) {}

  health() {
    this.logger.debug('health probe served');
    return { status: 'ok', component: COMPONENT_NAME, version: COMPONENT_VERSION, timestamp: new Date().toISOString() };
  }

  /** Lets host apps wire the component's pages into their navigation. */
  manifest(): ComponentManifest {
    const ui = this.config.paths.uiBasePath;
    return {
      name: COMPONENT_NAME,
      version: COMPONENT_VERSION,
      description: 'Admin dashboard for user management',
      nav: [
        { path: '/', label: 'Dashboard', icon: 'dashboard' },
        { path: '/users', label: 'Users', icon: 'users' }
      ],
      routes: [
        { path: '/', ui: `${ui}/dashboard` },
        { path: '/users', ui: `${ui}/users` },
        { path: '/users/:email', ui: `${ui}/users/:email` }
      ],
      dependencies: { modules: ['auth'] }
    };
  }
}
