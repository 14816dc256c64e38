/**
 * Providers for the environment-dependent template values:
 * the locale behind `{language}` and the application name behind `{source}`.
 */

export interface TemplateContext {
  /** Locale name such as `en_US` or `en-US` */
  localeName(): string;
  /** Name identifying the calling application */
  applicationName(): string;
}

export const DEFAULT_APPLICATION_NAME = 'opensearch-description';

/**
 * Resolve the process locale.
 *
 * POSIX variables win (`LC_ALL`, then `LC_MESSAGES`, then `LANG`), with any
 * `.encoding` or `@modifier` suffix removed. `C` and `POSIX` are not real
 * locales and fall through to the Intl default.
 */
export function systemLocaleName(env: NodeJS.ProcessEnv = process.env): string {
  for (const key of ['LC_ALL', 'LC_MESSAGES', 'LANG']) {
    const raw = env[key];
    if (!raw) continue;

    const name = raw.split(/[.@]/)[0] ?? '';
    if (name && name !== 'C' && name !== 'POSIX') {
      return name;
    }
  }

  return Intl.DateTimeFormat().resolvedOptions().locale;
}

/**
 * Build a context from fixed values; omitted values fall back to the system
 * locale and the package name.
 */
export function createTemplateContext(
  options: { locale?: string | null; applicationName?: string | null } = {}
): TemplateContext {
  const locale = options.locale ?? null;
  const applicationName = options.applicationName ?? DEFAULT_APPLICATION_NAME;

  return {
    localeName: () => locale ?? systemLocaleName(),
    applicationName: () => applicationName,
  };
}
