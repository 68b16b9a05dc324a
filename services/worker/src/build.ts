import { access } from 'node:fs/promises';
import path from 'node:path';

import { BuildResult, BuildRunner } from '@fixgate/domain';

import { describeProcessFailure, ProcessRunner, runProcess } from './exec.js';

export type BuildTool = 'gradle' | 'maven';

export interface BuildCommand {
  tool: BuildTool;
  file: string;
  args: string[];
}

export type FileExists = (filePath: string) => Promise<boolean>;

const fileExists: FileExists = async (filePath) => {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
};

const MAVEN_SKIPS = ['-Dspotbugs.skip=true', '-Dpmd.skip=true', '-Dcheckstyle.skip=true', '-Ddependency-check.skip=true'];

/**
 * Picks Gradle when a Gradle build file is present, else Maven when a POM is,
 * preferring the project's wrapper script. Static analysis plugins are skipped
 * so the build only compiles and runs tests.
 */
export async function detectBuildCommand(projectRoot: string, clean: boolean, exists: FileExists = fileExists): Promise<BuildCommand | null> {
  const at = (name: string) => path.join(projectRoot, name);

  if ((await exists(at('build.gradle'))) || (await exists(at('build.gradle.kts')))) {
    const wrapper = at('gradlew');
    return {
      tool: 'gradle',
      file: (await exists(wrapper)) ? wrapper : 'gradle',
      args: [...(clean ? ['clean'] : []), 'test', '--no-daemon', '--console=plain']
    };
  }

  if (await exists(at('pom.xml'))) {
    const wrapper = at('mvnw');
    return {
      tool: 'maven',
      file: (await exists(wrapper)) ? wrapper : 'mvn',
      args: [...(clean ? ['clean'] : []), 'test', ...MAVEN_SKIPS]
    };
  }

  return null;
}

export interface ToolchainBuildRunnerOptions {
  projectRoot: string;
  timeoutMs: number;
  run?: ProcessRunner;
  exists?: FileExists;
  now?: () => number;
}

export class ToolchainBuildRunner implements BuildRunner {
  private readonly run: ProcessRunner;
  private readonly exists: FileExists;
  private readonly now: () => number;

  constructor(private readonly options: ToolchainBuildRunnerOptions) {
    this.run = options.run ?? runProcess;
    this.exists = options.exists ?? fileExists;
    this.now = options.now ?? Date.now;
  }

  async build(options: { clean: boolean }): Promise<BuildResult> {
    const command = await detectBuildCommand(this.options.projectRoot, options.clean, this.exists);
    if (!command) {
      return {
        success: false,
        output: '',
        error: 'No build system detected (pom.xml or build.gradle not found)',
        durationMs: 0
      };
    }

    const started = this.now();
    try {
      const { stdout } = await this.run(command.file, command.args, {
        cwd: this.options.projectRoot,
        timeoutMs: this.options.timeoutMs
      });
      return { success: true, output: stdout, error: null, durationMs: this.now() - started };
    } catch (error) {
      const failure = describeProcessFailure(error);
      const durationMs = this.now() - started;
      return {
        success: false,
        output: failure.stdout,
        error: failure.timedOut ? `Build timeout after ${durationMs}ms` : failure.stderr || failure.message,
        durationMs
      };
    }
  }
}
