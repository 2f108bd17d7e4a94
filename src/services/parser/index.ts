export type { DependencyParserClientOptions } from './dependencyParser.client';
export { DependencyParserClient } from './dependencyParser.client';
