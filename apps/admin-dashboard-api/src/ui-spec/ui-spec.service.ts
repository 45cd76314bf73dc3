import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { ok, Result } from '../common/result';
import { dashboardDocument, userEditDocument, usersListDocument } from './ui-documents';
import type { UiDocument } from './ui-node.types';
import { parseViewId } from './view-id';

/**
 * Builds UI Specification Documents. Never calls the auth module, so the
 * `/ui/*` routes keep working while it is down.
 */
@Injectable()
export class UiSpecService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  resolve(viewId: string): Result<UiDocument> {
    const parsed = parseViewId(viewId);
    if (!parsed.ok) return parsed;

    const paths = this.config.paths;
    const target = parsed.value;
    switch (target.view) {
      case 'dashboard':
        return ok(dashboardDocument(paths));
      case 'users':
        return ok(usersListDocument(paths));
      case 'user-edit':
        return ok(userEditDocument(paths, target.email));
    }
  }
}
