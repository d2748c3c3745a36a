// pdf-parse's package entry runs a self-test when loaded without a parent module,
// so the parser is imported from its lib path, which @types/pdf-parse does not cover.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse = require('pdf-parse');
  export = pdfParse;
}
