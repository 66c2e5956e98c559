export { ParagraphAssembler } from './paragraph-assembler.service';
export { PreviewRenderer, CLEAR_LINE, PARTIAL_PREFIX, PARTIAL_SUFFIX, ELLIPSIS } from './preview-renderer.service';
export type { PreviewRendererOptions } from './preview-renderer.service';
