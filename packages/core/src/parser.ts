import matter from 'gray-matter';
import type { ComponentType, Frontmatter, ParseError, ParsedDocument } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Split a markdown file into YAML frontmatter and body.
 * Malformed YAML leaves the frontmatter empty and reports INVALID_FRONTMATTER.
 */
export function parseDocument(content: string): ParsedDocument {
  try {
    // gray-matter caches by content unless given options, and a cached entry
    // survives a failed parse without its error
    const { data, content: body } = matter(content, {});
    const frontmatter: Frontmatter = isRecord(data) ? { ...data } : {};
    return { frontmatter, body, errors: [] };
  } catch (error) {
    const errors: ParseError[] = [
      {
        code: 'INVALID_FRONTMATTER',
        message: `Could not parse frontmatter: ${describeError(error)}`,
      },
    ];
    return { frontmatter: {}, body: content, errors };
  }
}

/**
 * Decode a plugin manifest. The whole document plays the frontmatter role
 * and the body is empty.
 */
export function parseManifest(content: string): ParsedDocument {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return {
      frontmatter: {},
      body: '',
      errors: [{ code: 'INVALID_JSON', message: `Invalid JSON: ${describeError(error)}` }],
    };
  }

  if (!isRecord(data)) {
    return {
      frontmatter: {},
      body: '',
      errors: [{ code: 'INVALID_JSON', message: 'Manifest must be a JSON object' }],
    };
  }

  return { frontmatter: data, body: '', errors: [] };
}

/**
 * Parse a file with the parser its component type needs
 */
export function parseComponent(type: ComponentType, content: string): ParsedDocument {
  return type === 'plugin' ? parseManifest(content) : parseDocument(content);
}
