import type { DocumentTemplate } from '../types/index.js';

/** Freeze a pack and every template in it; packs are shared by every resolution */
export function freezePack(templates: DocumentTemplate[]): readonly DocumentTemplate[] {
  return Object.freeze(templates.map((template) => Object.freeze(template)));
}
