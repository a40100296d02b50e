import chalk from 'chalk';

const LOGO = `
${chalk.cyan('   ┌┬┐┬┬─┐┌┬┐┬┌┬┐┬ ┬')}
${chalk.cyan('    │││├┬┘ │ │ ││└┬┘')}
${chalk.cyan('   ─┴┘┴┴└─ ┴ ┴─┴┘ ┴ ')}
${chalk.dim('   cleanup actions for directory trees')}
`;

export function renderLogo(): void {
  console.log(LOGO);
}
