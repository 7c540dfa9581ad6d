import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

let parser: Parser | null = null;

// One parser per process: setLanguage is comparatively expensive and the
// resolver scans files strictly one after another.
export function getPythonParser(): Parser {
  if (!parser) {
    parser = new Parser();
    parser.setLanguage(Python);
  }
  return parser;
}
