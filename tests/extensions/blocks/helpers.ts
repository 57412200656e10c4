import { PipelineBuilder } from '../../../src/core/pipeline';
import { renderDocument } from '../../../src/core/serializer';
import type { Document } from '../../../src/core/types';
import { blocks } from '../../../src/extensions/blocks';

export function run(markdown: string, config?: unknown): Document {
  return new PipelineBuilder().use(blocks, config).build().run(markdown);
}

export function html(markdown: string, config?: unknown): string {
  return renderDocument(run(markdown, config));
}
