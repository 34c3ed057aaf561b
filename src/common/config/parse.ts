// src/common/config/parse.ts
import path from 'node:path';

import YAML from 'yaml';

/** Parse config text by file extension: `.json` as JSON, anything else as YAML. */
export const parseText = (file: string, text: string): unknown => {
  if (path.extname(file).toLowerCase() === '.json') {
    const value: unknown = JSON.parse(text);
    return value;
  }
  const doc = YAML.parseDocument(text);
  if (doc.errors.length > 0) throw doc.errors[0];
  return doc.toJS();
};
