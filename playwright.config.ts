import { defineConfig } from '@playwright/test';

export default defineConfig({
  testDir: './tests',
  outputDir: 'test-results',
  reporter: process.env.ALLURE === '1'
    ? [
      ['list'],
      ['allure-playwright', {
        detail: true,
        outputFolder: 'allure-results',
        suiteTitle: false
      }]
    ]
    : 'list',
  projects: [
    { name: 'engine' }
  ]
});
