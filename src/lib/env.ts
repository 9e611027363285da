/**
 * Environment for execa calls.
 *
 * Front ends launched from IDEs or GUI shells often miss Homebrew, MacPorts
 * and Nix bin dirs on PATH, which is where tmux usually lives.
 */

const extraDirs = [
  '/opt/homebrew/bin',
  '/opt/homebrew/sbin',
  '/usr/local/bin',
  '/opt/local/bin',
];

const home = process.env.HOME ?? '';
if (home) {
  extraDirs.push(`${home}/.nix-profile/bin`);
}

const augmentedPath = [process.env.PATH, ...extraDirs].filter(Boolean).join(':');

export const execaEnv = {
  env: { PATH: augmentedPath },
};
