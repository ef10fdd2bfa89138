import ora, { type Ora } from "ora";

export interface ProgressTask {
  increment(): void;
  finish(): void;
}

export interface ProgressReporter {
  start(label: string, total: number): ProgressTask;
}

/** Spinner on stderr showing `label done/total` for the album being mirrored. */
export class SpinnerProgressReporter implements ProgressReporter {
  start(label: string, total: number): ProgressTask {
    const spinner: Ora = ora({ text: `${label} 0/${total}`, indent: 2 }).start();
    let done = 0;

    return {
      increment() {
        done += 1;
        spinner.text = `${label} ${done}/${total}`;
      },
      finish() {
        spinner.succeed(`${label} ${done}/${total}`);
      }
    };
  }
}

export class SilentProgressReporter implements ProgressReporter {
  start(): ProgressTask {
    return { increment() {}, finish() {} };
  }
}
