import pc from "picocolors";

const LOGO = `
  ██████   ██████ ██████  ██████      ██████  ██████  ██ ██████   ██████  ███████
 ██    ██ ██      ██   ██ ██   ██     ██   ██ ██   ██ ██ ██   ██ ██       ██
 ██    ██ ██      ██████  ██████      ██████  ██████  ██ ██   ██ ██   ███ █████
 ██    ██ ██      ██      ██          ██   ██ ██   ██ ██ ██   ██ ██    ██ ██
  ██████   ██████ ██      ██          ██████  ██   ██ ██ ██████   ██████  ███████
`;

const TAGLINE = "  Charge points in, pub/sub out";

export function printBanner(version: string): void {
  const lines = LOGO.split("\n");
  const colors = [pc.cyan, pc.blue, pc.magenta, pc.magenta, pc.blue, pc.cyan];

  lines.forEach((line, i) => {
    const colorFn = colors[i % colors.length] ?? pc.cyan;
    process.stdout.write(`${colorFn(line)}\n`);
  });

  console.log(pc.dim(TAGLINE) + pc.dim(`  v${version}`));
  console.log();
}
