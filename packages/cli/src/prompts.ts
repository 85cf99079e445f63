/** Ask for the document path on the terminal. Returns the raw answer. */
export async function askForDocumentPath(): Promise<string> {
  const { default: inquirer } = await import('inquirer');

  const answers = await inquirer.prompt([
    {
      type: 'input',
      name: 'path',
      message: 'Enter the path to your document:',
    },
  ]);

  const value: unknown = answers.path;
  return typeof value === 'string' ? value : '';
}
