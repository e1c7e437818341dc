/**
 * AMI Frame Parser
 *
 * The Asterisk manager interface speaks line-oriented "Key: Value" frames
 * terminated by an empty line. The first line after connect is a bare
 * greeting ("Asterisk Call Manager/5.0.1") with no colon.
 *
 * The parser is fed arbitrary TCP chunks and returns every complete frame.
 */

export type AmiFrame = Record<string, string>;

export class AmiFrameParser {
  private buffer = '';
  private greeted = false;
  greeting: string | null = null;

  push(chunk: string): AmiFrame[] {
    // CR is dropped up front so a CRLF split across chunks cannot leak through
    this.buffer += chunk.replace(/\r/g, '');

    if (!this.greeted) {
      const newline = this.buffer.indexOf('\n');
      if (newline === -1) return [];
      const firstLine = this.buffer.slice(0, newline);
      this.greeted = true;
      if (!firstLine.includes(':')) {
        this.greeting = firstLine.trim();
        this.buffer = this.buffer.slice(newline + 1);
      }
    }

    const frames: AmiFrame[] = [];
    let end = this.buffer.indexOf('\n\n');
    while (end !== -1) {
      const block = this.buffer.slice(0, end);
      this.buffer = this.buffer.slice(end + 2);
      const frame = parseFrame(block);
      if (Object.keys(frame).length > 0) {
        frames.push(frame);
      }
      end = this.buffer.indexOf('\n\n');
    }
    return frames;
  }

  reset(): void {
    this.buffer = '';
    this.greeted = false;
    this.greeting = null;
  }
}

export function parseFrame(block: string): AmiFrame {
  const frame: AmiFrame = {};
  for (const line of block.split('\n')) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    frame[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
  }
  return frame;
}

/** Serialize an action for the wire */
export function formatAction(fields: Record<string, string>): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}: ${value}\r\n`)
    .join('') + '\r\n';
}
