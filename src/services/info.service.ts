import type { AppConfig } from '../config/env';
import { maskDatabaseUrl } from './database.service';

export const SERVICE_NAME = 'Error Webhook Collector';
export const SERVICE_VERSION = '1.0.0';

/** Configuration safe to expose: no DSN, no connection string. */
export function publicConfig(config: AppConfig) {
  return {
    sentry: {
      project: config.allowedProject,
      organization: config.allowedOrganization,
      filter_by_project: config.filterByProject,
      dsn_configured: config.sentryDsn !== null,
    },
    database: {
      url: maskDatabaseUrl(config.databaseUrl),
    },
  };
}

export function serviceInfo(config: AppConfig) {
  const { sentry } = publicConfig(config);
  return {
    message: `${SERVICE_NAME} API`,
    version: SERVICE_VERSION,
    endpoints: {
      webhook: '/webhook',
      sentry_webhook: '/sentry/webhook',
      latest_error: '/errors/latest',
      all_errors: '/errors',
      config: '/config',
      health: '/health',
    },
    sentry_config: {
      project: sentry.project ?? 'not configured',
      organization: sentry.organization ?? 'not configured',
      filter_by_project: sentry.filter_by_project,
      dsn_configured: sentry.dsn_configured,
    },
  };
}
