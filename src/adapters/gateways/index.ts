export { ConsoleLoggerGateway } from './ConsoleLoggerGateway';
export type { LineWriter } from './ConsoleLoggerGateway';
export { FastGlobPathIndexer } from './FastGlobPathIndexer';
export { JsDiffLineAligner } from './JsDiffLineAligner';
export { NodeFileSystemGateway } from './NodeFileSystemGateway';
export { ReadlineDecisionGateway } from './ReadlineDecisionGateway';
export { StdoutReportGateway } from './StdoutReportGateway';
export type { TextWriter } from './StdoutReportGateway';
