import js from '@eslint/js';
import tseslint from 'typescript-eslint';

export default tseslint.config(
  js.configs.recommended,
  ...tseslint.configs.recommended,
  {
    languageOptions: {
      parserOptions: {
        project: './tsconfig.json',
        ecmaVersion: 2022,
        sourceType: 'module',
      },
    },
    rules: {
      // 引数名の先頭 _ は未使用として許可する
      '@typescript-eslint/no-unused-vars': ['error', { argsIgnorePattern: '^_' }],
      '@typescript-eslint/no-floating-promises': 'error',
      '@typescript-eslint/no-explicit-any': 'error',

      // 複雑度
      'max-depth': ['error', 4],
      complexity: ['warn', 15],
      'max-lines-per-function': ['warn', { max: 100, skipBlankLines: true, skipComments: true }],
      'max-params': ['warn', 5],
    },
  },
  {
    // テストファイルは複雑度チェックを緩和
    files: ['tests/**/*.ts'],
    rules: {
      'max-lines-per-function': ['warn', { max: 400, skipBlankLines: true, skipComments: true }],
      'max-depth': ['warn', 6],
      complexity: ['warn', 25],
    },
  },
  {
    ignores: ['dist/**', 'node_modules/**', '*.config.ts'],
  }
);
