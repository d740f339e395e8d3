export { RetrievalTool, formatPassages, type RetrievalToolOptions } from './retrieval-tool.js';
