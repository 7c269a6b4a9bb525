/**
 * Minimal POSIX shell front end for the simulated VMs: quoting, `;`, `&&`,
 * `||`, pipes and the redirections the orchestration commands use. No
 * variables, globbing or subshells.
 */

export interface CommandOutcome {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ShellHost {
  run(argv: string[], stdin: string): CommandOutcome;
  writeFile(path: string, content: string, append: boolean): void;
}

type Operator = ';' | '&&' | '||' | '|' | '>' | '>>' | '2>' | '2>&1';

type Token =
  | { kind: 'word'; value: string }
  | { kind: 'op'; value: Operator };

type Redirect =
  | { kind: 'stdout'; target: string; append: boolean }
  | { kind: 'stderr'; target: string }
  | { kind: 'stderr-to-stdout' };

interface SimpleCommand {
  argv: string[];
  redirects: Redirect[];
}

type ListOperator = ';' | '&&' | '||';

export class ShellSyntaxError extends Error {
  readonly name = 'ShellSyntaxError';
}

export function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  let word = '';
  let inWord = false;
  let i = 0;

  const flush = (): void => {
    if (inWord) {
      tokens.push({ kind: 'word', value: word });
      word = '';
      inWord = false;
    }
  };
  const operator = (value: Operator): void => {
    flush();
    tokens.push({ kind: 'op', value });
    i += value.length;
  };

  while (i < line.length) {
    const c = line.charAt(i);

    if (c === "'") {
      const end = line.indexOf("'", i + 1);
      if (end < 0) throw new ShellSyntaxError('unterminated single quote');
      word += line.slice(i + 1, end);
      inWord = true;
      i = end + 1;
    } else if (c === '"') {
      let j = i + 1;
      while (j < line.length && line.charAt(j) !== '"') {
        if (line.charAt(j) === '\\' && (line.charAt(j + 1) === '"' || line.charAt(j + 1) === '\\')) {
          j++;
        }
        word += line.charAt(j);
        j++;
      }
      if (j >= line.length) throw new ShellSyntaxError('unterminated double quote');
      inWord = true;
      i = j + 1;
    } else if (c === '\\') {
      word += line.charAt(i + 1);
      inWord = true;
      i += 2;
    } else if (c === ' ' || c === '\t' || c === '\n') {
      flush();
      i++;
    } else if (line.startsWith('&&', i)) {
      operator('&&');
    } else if (line.startsWith('||', i)) {
      operator('||');
    } else if (c === '|') {
      operator('|');
    } else if (c === ';') {
      operator(';');
    } else if (!inWord && line.startsWith('2>&1', i)) {
      operator('2>&1');
    } else if (!inWord && line.startsWith('2>', i)) {
      operator('2>');
    } else if (line.startsWith('>>', i)) {
      operator('>>');
    } else if (c === '>') {
      operator('>');
    } else if (c === '&') {
      throw new ShellSyntaxError('background jobs are not supported');
    } else {
      word += c;
      inWord = true;
      i++;
    }
  }
  flush();
  return tokens;
}

interface ParsedList {
  pipelines: SimpleCommand[][];
  operators: ListOperator[];
}

export function parse(line: string): ParsedList {
  const tokens = tokenize(line);
  const pipelines: SimpleCommand[][] = [];
  const operators: ListOperator[] = [];
  let pipeline: SimpleCommand[] = [];
  let current: SimpleCommand = { argv: [], redirects: [] };

  const endCommand = (): void => {
    if (current.argv.length === 0) throw new ShellSyntaxError(`empty command in '${line}'`);
    pipeline.push(current);
    current = { argv: [], redirects: [] };
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) break;
    if (token.kind === 'word') {
      current.argv.push(token.value);
      continue;
    }

    switch (token.value) {
      case '|':
        endCommand();
        break;
      case ';':
      case '&&':
      case '||':
        endCommand();
        pipelines.push(pipeline);
        pipeline = [];
        operators.push(token.value);
        break;
      case '2>&1':
        current.redirects.push({ kind: 'stderr-to-stdout' });
        break;
      case '>':
      case '>>':
      case '2>': {
        const target = tokens[i + 1];
        if (target === undefined || target.kind !== 'word') {
          throw new ShellSyntaxError(`redirection without a target in '${line}'`);
        }
        i++;
        current.redirects.push(
          token.value === '2>'
            ? { kind: 'stderr', target: target.value }
            : { kind: 'stdout', target: target.value, append: token.value === '>>' }
        );
        break;
      }
    }
  }

  // A trailing ';' is allowed
  if (current.argv.length > 0 || pipeline.length > 0 || pipelines.length === 0) {
    endCommand();
    pipelines.push(pipeline);
  } else {
    operators.pop();
  }
  return { pipelines, operators };
}

/**
 * Run an and-or list against a host. Output is the combined stdout/stderr
 * stream, as an out-of-band exec channel would return it.
 */
export function runShell(host: ShellHost, line: string): CommandOutcome {
  let parsed: ParsedList;
  try {
    parsed = parse(line);
  } catch (error) {
    if (error instanceof ShellSyntaxError) {
      return { stdout: '', stderr: `sh: syntax error: ${error.message}\n`, exitCode: 2 };
    }
    throw error;
  }

  let output = '';
  let status = 0;
  parsed.pipelines.forEach((pipeline, index) => {
    const operator = index === 0 ? ';' : parsed.operators[index - 1];
    if ((operator === '&&' && status !== 0) || (operator === '||' && status === 0)) {
      return;
    }
    const result = runPipeline(host, pipeline);
    output += result.output;
    status = result.exitCode;
  });

  return { stdout: output, stderr: '', exitCode: status };
}

type Destination =
  | { kind: 'stdout' }
  | { kind: 'stderr' }
  | { kind: 'null' }
  | { kind: 'file'; path: string; append: boolean };

function destinationOf(target: string, append: boolean): Destination {
  return target === '/dev/null' ? { kind: 'null' } : { kind: 'file', path: target, append };
}

function runPipeline(host: ShellHost, pipeline: SimpleCommand[]): { output: string; exitCode: number } {
  let stdin = '';
  let output = '';
  let exitCode = 0;

  pipeline.forEach((command, index) => {
    const result = host.run(command.argv, stdin);

    // Redirections apply left to right: `>/dev/null 2>&1` silences both
    let fd1: Destination = { kind: 'stdout' };
    let fd2: Destination = { kind: 'stderr' };
    for (const redirect of command.redirects) {
      if (redirect.kind === 'stderr-to-stdout') {
        fd2 = fd1;
      } else if (redirect.kind === 'stderr') {
        fd2 = destinationOf(redirect.target, false);
      } else {
        fd1 = destinationOf(redirect.target, redirect.append);
      }
    }

    let piped = '';
    const deliver = (text: string, destination: Destination): void => {
      switch (destination.kind) {
        case 'stdout':
          piped += text;
          break;
        case 'stderr':
          output += text;
          break;
        case 'file':
          host.writeFile(destination.path, text, destination.append);
          break;
        case 'null':
          break;
      }
    };
    deliver(result.stderr, fd2);
    deliver(result.stdout, fd1);

    if (index === pipeline.length - 1) {
      output += piped;
    } else {
      stdin = piped;
    }
    exitCode = result.exitCode;
  });

  return { output, exitCode };
}
