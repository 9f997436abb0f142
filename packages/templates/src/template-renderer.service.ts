import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import nunjucks from "nunjucks";
import { PromptTemplate } from "./prompt-template";
import { compileJinja, createJinjaEnvironment } from "./jinja";
import type {
  TemplateDescriptor,
  TemplateFormat,
  TemplateVariables,
} from "./template.types";

const DEFAULT_ENCODING: BufferEncoding = "utf-8";
const JINJA_EXTENSIONS = new Set([".njk", ".jinja", ".jinja2", ".j2"]);

interface CachedTemplateEntry {
  template: PromptTemplate;
  mtimeMs: number;
}

/**
 * Loads prompt templates from disk. Each cache entry tracks the source
 * file's mtime and is rebuilt when the file changes.
 */
@Injectable()
export class TemplateRendererService {
  private readonly environments = new Map<string, nunjucks.Environment>();
  private readonly templateCache = new Map<string, CachedTemplateEntry>();

  async loadTemplate(descriptor: TemplateDescriptor): Promise<PromptTemplate> {
    const absolutePath = this.resolvePath(descriptor);
    const format = descriptor.format ?? this.detectFormat(absolutePath);
    const { mtimeMs } = await fs.stat(absolutePath);
    const cacheKey = `${format}:${absolutePath}`;

    const cached = this.templateCache.get(cacheKey);
    if (cached && cached.mtimeMs === mtimeMs) {
      return this.withDescriptorVariables(cached.template, descriptor);
    }

    const source = await fs.readFile(absolutePath, {
      encoding: descriptor.encoding ?? DEFAULT_ENCODING,
    });
    const template =
      format === "jinja2"
        ? new PromptTemplate(
            source,
            { format },
            compileJinja(source, this.getEnvironment(descriptor, absolutePath), absolutePath)
          )
        : new PromptTemplate(source, { format });

    this.templateCache.set(cacheKey, { template, mtimeMs });
    return this.withDescriptorVariables(template, descriptor);
  }

  async renderTemplate(
    descriptor: TemplateDescriptor,
    variables: TemplateVariables = {}
  ): Promise<string> {
    const template = await this.loadTemplate(descriptor);
    return template.render(variables);
  }

  renderString(
    template: string,
    variables: TemplateVariables = {},
    format: TemplateFormat = "fstring"
  ): string {
    return new PromptTemplate(template, { format }).render(variables);
  }

  private withDescriptorVariables(
    template: PromptTemplate,
    descriptor: TemplateDescriptor
  ): PromptTemplate {
    return descriptor.variables ? template.partial(descriptor.variables) : template;
  }

  private detectFormat(filePath: string): TemplateFormat {
    return JINJA_EXTENSIONS.has(path.extname(filePath).toLowerCase())
      ? "jinja2"
      : "fstring";
  }

  private resolvePath(descriptor: TemplateDescriptor): string {
    const baseDir = descriptor.baseDir ?? process.cwd();
    return path.isAbsolute(descriptor.file)
      ? descriptor.file
      : path.resolve(baseDir, descriptor.file);
  }

  private getEnvironment(
    descriptor: TemplateDescriptor,
    absolutePath: string
  ): nunjucks.Environment {
    const searchPaths = new Set<string>([path.dirname(absolutePath)]);
    if (descriptor.baseDir) {
      searchPaths.add(path.resolve(descriptor.baseDir));
    }
    const key = Array.from(searchPaths).join("|");

    let env = this.environments.get(key);
    if (!env) {
      const loader = new nunjucks.FileSystemLoader(Array.from(searchPaths), {
        noCache: false,
        watch: false,
      });
      env = createJinjaEnvironment(loader);
      this.environments.set(key, env);
    }
    return env;
  }
}
