export type {
  PromptTemplateOptions,
  TemplateDescriptor,
  TemplateFormat,
  TemplateVariables,
} from "./template.types";
export { parseFString, fStringVariables, type FStringSegment } from "./fstring";
export { compileJinja, jinjaVariables } from "./jinja";
export { renderValue } from "./render-value";
export { PromptTemplate, type PromptFormatter } from "./prompt-template";
export { MessageTemplate } from "./message-template";
export {
  MessageFormatter,
  literal,
  placeholder,
  templated,
  type TemplateNode,
} from "./message-formatter";
export { TemplateRendererService } from "./template-renderer.service";
export { TemplateModule } from "./template.module";
