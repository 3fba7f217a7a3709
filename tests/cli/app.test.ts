import { App, USAGE } from '../../src/app.js';

class Capture {
  chunks: string[] = [];
  readonly isTTY = false;

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

describe('App', () => {
  let out: Capture;
  let err: Capture;
  let app: App;

  beforeEach(() => {
    out = new Capture();
    err = new Capture();
    app = new App({ out, err });
  });

  it('should print the version', async () => {
    await expect(app.run(['--version'])).resolves.toBe(0);
    expect(out.text).toBe('reeltag 1.0.0\n');
  });

  it('should print usage for --help', async () => {
    await expect(app.run(['--help'])).resolves.toBe(0);
    expect(out.text).toBe(USAGE);
  });

  it('should print usage and fail without a command', async () => {
    await expect(app.run([])).resolves.toBe(2);
    expect(out.text).toBe(USAGE);
  });

  it('should reject an unknown command', async () => {
    await expect(app.run(['frobnicate'])).resolves.toBe(2);
    expect(err.text.startsWith("reeltag: unknown command 'frobnicate'\n")).toBe(true);
  });

  it('should map validation errors to exit status 2', async () => {
    await expect(app.run(['verify'])).resolves.toBe(2);
    expect(err.text).toBe('reeltag: invalid verify options: paths: verify needs at least one file\n');
  });

  it('should refuse a bare --workers flag before touching any file', async () => {
    await expect(app.run(['tag', '/definitely/not/here.mp4', '--workers'])).resolves.toBe(2);
    expect(err.text).toBe('reeltag: invalid tag options: workers: workers needs a number\n');
  });

  it('should exit 1 when tagging input does not exist', async () => {
    await expect(app.run(['tag', '/definitely/not/here.mp4'])).resolves.toBe(1);
    expect(err.text.startsWith('reeltag: cannot access /definitely/not/here.mp4:')).toBe(true);
  });
});
