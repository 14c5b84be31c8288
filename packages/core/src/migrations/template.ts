import Handlebars from "handlebars";

export type TemplateVars = Record<string, unknown>;

export const renderTemplate = (
  content: string,
  ctx: TemplateVars = {},
): string => {
  const template = Handlebars.compile(content, { noEscape: true });

  return template(ctx);
};
