import { promises as fs } from 'fs'
import { TextDecoder } from 'util'
import { structuredPatch } from 'diff'

export interface LineChange {
  changedLines: number
  linesBefore: number
  linesAfter: number
}

export class LineCounter {
  // Strict UTF-8; a leading byte-order mark is dropped by the decoder
  private decoder = new TextDecoder('utf-8', { fatal: true })

  /**
   * Read a file as text. Throws on I/O errors and on bytes that are not UTF-8.
   */
  async readText(filePath: string): Promise<string> {
    const buffer = await fs.readFile(filePath)
    return this.decoder.decode(buffer)
  }

  normalize(content: string): string {
    return content.replace(/\r\n?/g, '\n')
  }

  /**
   * Count line records: `a\nb` and `a\nb\n` both hold two.
   */
  countLines(content: string): number {
    const normalized = this.normalize(content)
    if (!normalized) return 0
    const separators = normalized.match(/\n/g)?.length ?? 0
    return normalized.endsWith('\n') ? separators : separators + 1
  }

  /**
   * Count the lines a unified diff from `before` to `after` adds or removes.
   * File headers and hunk markers are not lines of the diff body and never count.
   */
  compare(before: string, after: string): LineChange {
    const patch = structuredPatch('before', 'after', this.normalize(before), this.normalize(after), '', '')
    let changedLines = 0
    for (const hunk of patch.hunks) {
      for (const line of hunk.lines) {
        if (line.startsWith('+') || line.startsWith('-')) {
          changedLines++
        }
      }
    }

    return {
      changedLines,
      linesBefore: this.countLines(before),
      linesAfter: this.countLines(after),
    }
  }
}
