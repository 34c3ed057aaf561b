import { loadConfigSync } from '@/cli/config/load';

/**
 * Render a help footer with the effective packaging defaults and examples.
 *
 * @param cwd - Repo root (or descendant) used to locate `ctxpack.config.*`.
 * @returns Multi-line string (empty when config cannot be loaded).
 */
export const renderDefaultsHelp = (cwd: string): string => {
  try {
    const cfg = loadConfigSync(cwd);
    const p = cfg.packager;
    return [
      '',
      `Config: ${cfg.path ? cfg.path.replace(/\\/g, '/') : '(none; built-in defaults)'}`,
      '',
      'Effective packaging defaults:',
      `  context   ${p.context}`,
      `  archive   ${p.archiveName} (staging: ${p.staging})`,
      `  tag       ${p.tag}${p.noCache ? ' (no cache)' : ''}`,
      `  exclude   ${p.exclude.join(', ') || '(none)'}`,
      '',
      'Examples:',
      '  ctxpack                     # archive, build, clean up',
      '  ctxpack build -t my/img:dev --cache',
      '  ctxpack pack out.tar        # archive only',
      '  ctxpack ci --plan           # list CI steps',
      '',
    ].join('\n');
  } catch (e) {
    if (process.env.CTXPACK_DEBUG === '1') {
      console.error('ctxpack: unable to load config for help footer', e);
    }
    return '';
  }
};
