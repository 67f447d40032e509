import { logger } from '../../utils/logger.js';
import { CompilerError } from '../../utils/errors.js';
import { describeProcessFailure, runProcess, type ProcessRunner } from './process.js';

export interface CompileRequest {
  command: string;
  sourcePath: string;
  outputOption: string;
  outputPath: string;
}

/**
 * External compiler. Invoked once per module as
 * `<command> <sourcePath> <outputOption> <outputPath>`.
 */
export interface Compiler {
  compile(request: CompileRequest): Promise<void>;
}

export class ProcessCompiler implements Compiler {
  constructor(private readonly run: ProcessRunner = runProcess) {}

  async compile(request: CompileRequest): Promise<void> {
    const args = [request.sourcePath, request.outputOption, request.outputPath];
    logger.debug(`Compiling ${request.sourcePath}`, { command: request.command, args });
    try {
      await this.run(request.command, args);
    } catch (error) {
      throw new CompilerError(`${request.command} ${request.sourcePath}: ${describeProcessFailure(error)}`, {
        ...request,
        error
      });
    }
  }
}
