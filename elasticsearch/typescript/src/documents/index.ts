export {
  generateDocuments,
  toAsyncDocuments,
  toDocumentId,
  findDuplicateIds,
} from './generator.js';
