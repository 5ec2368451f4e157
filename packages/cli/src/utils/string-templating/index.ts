// pattern: Functional Core
import { render } from "micromustache";
import { join, resolve } from "path";

import type { PathStringTemplate } from "../../config/types/index.js";

/**
 * Values available to path templates
 */
export interface PathTemplateContext {
  home: string;
  projectDir: string;
  env: Record<string, string | undefined>;
}

/**
 * Render a Mustache template. Unknown variables render as empty strings.
 */
export function applyTemplate(
  template: string,
  variables: Record<string, unknown>
): string {
  return render(template, variables);
}

/**
 * Resolve a configured path: expand a leading `~`, render
 * `{{dirs.home}}`, `{{dirs.project}}` and `{{parentEnv.NAME}}`, then resolve the
 * result against the project directory.
 */
export function expandPathTemplate(
  template: PathStringTemplate | string,
  context: PathTemplateContext
): string {
  let raw: string = template;
  if (raw === "~") {
    raw = context.home;
  } else if (raw.startsWith("~/")) {
    raw = join(context.home, raw.slice(2));
  }

  const rendered = applyTemplate(raw, {
    dirs: { home: context.home, project: context.projectDir },
    parentEnv: context.env,
  });

  return resolve(context.projectDir, rendered);
}
