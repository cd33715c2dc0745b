import packageJson from '../package.json';

// Bundled into the build, so the CLI never reads package.json at run time
const version: string = packageJson.version;

export { version };
