import type { ProjectTemplate } from './shared.js';
import { projectFiles } from './shared.js';

export const PYTHON_TEMPLATE: ProjectTemplate = {
  hint: 'python file reading a custom-schema input',
  files: (projectName) => [
    ...projectFiles(projectName),
    {
      path: 'functions/wordcount/function.ts',
      content: `import { defineFunction, Runtime } from '@fnconfig/core';

export default defineFunction({
  className: 'wordcount.WordCount',
  runtime: Runtime.PYTHON,
  py: 'functions/wordcount/wordcount.py',
  customSchemaInputs: { 'persistent://public/default/lines': 'STRING' },
  output: 'persistent://public/default/counts',
  parallelism: 2,
});
`,
    },
    {
      path: 'functions/wordcount/wordcount.py',
      content: `class WordCount:
    def process(self, line, context):
        return str(len(line.split()))
`,
    },
  ],
};
