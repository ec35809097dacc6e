import type { ProjectTemplate } from './shared.js';
import { projectFiles } from './shared.js';

const FUNCTION_CLASS = 'com.example.ExclamationFunction';

export const JAVA_TEMPLATE: ProjectTemplate = {
  hint: 'jar package with declared input and output types',
  files: (projectName) => [
    ...projectFiles(projectName, {
      [FUNCTION_CLASS]: { input: 'java.lang.String', output: 'java.lang.String' },
    }),
    {
      path: 'functions/exclamation/function.ts',
      content: `import { defineFunction, ProcessingGuarantee, Runtime } from '@fnconfig/core';

export default defineFunction({
  className: '${FUNCTION_CLASS}',
  runtime: Runtime.JAVA,
  jar: 'target/exclamation.jar',
  inputs: ['persistent://public/default/sentences'],
  output: 'persistent://public/default/exclaimed',
  processingGuarantees: ProcessingGuarantee.AT_LEAST_ONCE,
  maxMessageRetries: 3,
  deadLetterTopic: 'persistent://public/default/exclaimed-dlq',
  userConfig: { suffix: '!' },
});
`,
    },
  ],
};
