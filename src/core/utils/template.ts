export type TemplateData = Record<string, string | number | undefined>;

// Replace {{key}} placeholders with values from data
// Unknown keys and undefined values leave the placeholder as written
export const renderTemplate = (template: string, data?: TemplateData): string => {
  if (!data) {
    return template;
  }

  return template.replace(/\{\{\s*([^}\s]+)\s*\}\}/g, (match: string, key: string) => {
    const value = data[key];
    if (value === undefined) {
      return match;
    }
    return String(value);
  });
};
