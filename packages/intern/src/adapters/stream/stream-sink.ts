import type { Writable } from "node:stream"

import type { OutputSink } from "../../ports/output-sink"

export type StreamSinkDeps = {
  stream: Writable
}

export type StreamSinkOptions<V> = {
  /** Renders one value as a single line, without the trailing newline. */
  format: (value: V) => string
}

/**
 * Writes one line per appended value to a `Writable`.
 *
 * `append` resolves once the stream has accepted the line. After the stream
 * reports an error every further `append` rejects with that error.
 */
export class StreamSink<V> implements OutputSink<V> {
  private written = 0
  private failure: Error | undefined

  public constructor(
    private readonly deps: StreamSinkDeps,
    private readonly opts: StreamSinkOptions<V>,
  ) {
    deps.stream.on("error", (err: Error) => {
      this.failure ??= err
    })
  }

  public async append(value: V): Promise<void> {
    if (this.failure) throw this.failure

    const line = `${this.opts.format(value)}\n`

    await new Promise<void>((resolve, reject) => {
      this.deps.stream.write(line, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })

    this.written++
  }

  public count(): number {
    return this.written
  }
}
