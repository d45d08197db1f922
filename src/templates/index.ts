/**
 * Template utilities for Handlebars template rendering
 */

import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import path from "path";
import { fileExists } from "../utils/file-exists";
import {
  getDefaultPageTemplate,
  getDefaultCreditsTemplate,
  getDefaultPartTemplate,
  getDefaultColophonTemplate,
  getDefaultPackageTemplate,
  getDefaultNavTemplate,
  getDefaultNcxTemplate,
  getDefaultStylesheet,
  CONTAINER_XML,
} from "./defaults";
import type {
  EditionTemplateContext,
  NavigationTemplateContext,
  PackageTemplateContext,
  PageTemplateContext,
  PartTemplateContext,
  TemplatesConfig,
} from "../types";

export { CONTAINER_XML };

// Renders the short commit hash, linked when the revision has a URL
Handlebars.registerHelper("commitLink", (revision: unknown) => {
  if (!revision || typeof revision !== "object") return "";

  const short = "short" in revision ? String(revision.short) : "unknown";
  const url = "url" in revision ? String(revision.url) : "";
  const label = Handlebars.escapeExpression(short);

  if (!url) {
    return new Handlebars.SafeString(`<span class="commit">${label}</span>`);
  }
  return new Handlebars.SafeString(
    `<a class="commit" href="${Handlebars.escapeExpression(url)}">${label}</a>`,
  );
});

export interface TemplateSet {
  credits: string | null;
  part: string | null;
  colophon: string | null;
}

export interface PageTemplates {
  page: HandlebarsTemplateDelegate<PageTemplateContext>;
  credits: HandlebarsTemplateDelegate<EditionTemplateContext>;
  part: HandlebarsTemplateDelegate<PartTemplateContext>;
  colophon: HandlebarsTemplateDelegate<EditionTemplateContext>;
  packageDocument: HandlebarsTemplateDelegate<PackageTemplateContext>;
  navigation: HandlebarsTemplateDelegate<NavigationTemplateContext>;
  ncx: HandlebarsTemplateDelegate<NavigationTemplateContext>;
  stylesheet: string;
}

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 */
export async function loadTemplate<T>(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<HandlebarsTemplateDelegate<T>> {
  if (templatePath === null) {
    return Handlebars.compile<T>(defaultTemplate);
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile<T>(templateContent);
}

/**
 * Detect page template overrides in a directory
 * Returns paths to template files if they exist
 */
export async function detectTemplates(directory: string | null): Promise<TemplateSet> {
  if (directory === null) {
    return { credits: null, part: null, colophon: null };
  }

  const creditsPath = path.join(directory, "credits.xhtml.hbs");
  const partPath = path.join(directory, "part.xhtml.hbs");
  const colophonPath = path.join(directory, "colophon.xhtml.hbs");

  return {
    credits: (await fileExists(creditsPath)) ? creditsPath : null,
    part: (await fileExists(partPath)) ? partPath : null,
    colophon: (await fileExists(colophonPath)) ? colophonPath : null,
  };
}

/**
 * Load every template the packager needs
 * Page bodies may be overridden from the templates directory; the
 * package documents always use the built-in templates.
 */
export async function loadTemplates(config: TemplatesConfig): Promise<PageTemplates> {
  const detected = await detectTemplates(config.directory);

  const stylesheet =
    config.stylesheet === null
      ? getDefaultStylesheet()
      : await readFile(config.stylesheet, "utf-8");

  return {
    page: await loadTemplate<PageTemplateContext>(null, getDefaultPageTemplate()),
    credits: await loadTemplate<EditionTemplateContext>(
      detected.credits,
      getDefaultCreditsTemplate(),
    ),
    part: await loadTemplate<PartTemplateContext>(detected.part, getDefaultPartTemplate()),
    colophon: await loadTemplate<EditionTemplateContext>(
      detected.colophon,
      getDefaultColophonTemplate(),
    ),
    packageDocument: await loadTemplate<PackageTemplateContext>(
      null,
      getDefaultPackageTemplate(),
    ),
    navigation: await loadTemplate<NavigationTemplateContext>(null, getDefaultNavTemplate()),
    ncx: await loadTemplate<NavigationTemplateContext>(null, getDefaultNcxTemplate()),
    stylesheet,
  };
}
