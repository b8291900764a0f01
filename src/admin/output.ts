import { Output } from '../types';

export const stdoutOutput: Output = {
    write(line: string) {
        process.stdout.write(`${line}\n`);
    },
};

export class BufferedOutput implements Output {
    public readonly lines: string[] = [];

    write(line: string): void {
        this.lines.push(line);
    }
}
