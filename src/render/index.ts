export { createTemplateEngine, classifyFailure } from './engine';
export type { TemplateEngine } from './engine';
export { selectTemplates, isPartial } from './selector';
export type { SelectionOptions } from './selector';
export { renderStack, withTrailingNewline } from './dispatcher';
export type { DispatchContext } from './dispatcher';
