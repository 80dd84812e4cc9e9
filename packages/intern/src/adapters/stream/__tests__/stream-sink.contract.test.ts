import { describeOutputSinkContract } from "../../../ports/__tests__/output-sink.contract"
import { StreamSink } from "../stream-sink"
import { memoryWritable } from "./memory-writable"

describeOutputSinkContract({
  name: "StreamSink",
  make: () => {
    const out = memoryWritable()
    const sink = new StreamSink<string>({ stream: out.stream }, { format: (value) => value })
    return { sink, read: out.lines }
  },
})
