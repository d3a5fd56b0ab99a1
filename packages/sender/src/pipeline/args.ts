import type { PipelineCommand, PipelineSpec } from '../types/index.js'

export const GST_LAUNCH = 'gst-launch-1.0'
export const FFMPEG = 'ffmpeg'

/** Child-side number of the first inherited descriptor (after stdin/stdout/stderr) */
export const INHERITED_FD_BASE = 3

export const TEST_PATTERN_SIZE = { width: 1280, height: 720 } as const

function encodeAndSend(spec: PipelineSpec): string[] {
  const bitrateBps = spec.bitrateKbps * 1000
  return [
    'v4l2h264enc', `extra-controls=controls,video_bitrate=${bitrateBps};`, '!',
    'video/x-h264,profile=baseline,stream-format=byte-stream', '!',
    'mpegtsmux', '!',
    'tcpclientsink', `host=${spec.receiver.host}`, `port=${spec.receiver.port}`,
  ]
}

function portalSource(spec: PipelineSpec): string[] {
  if (spec.transportDescriptor === undefined) {
    throw new Error('Portal pipeline needs the PipeWire remote descriptor')
  }
  return [
    'pipewiresrc', `fd=${INHERITED_FD_BASE}`, `path=${spec.sourceHandle}`,
    'do-timestamp=true', 'keepalive-time=1000', '!',
    'videoconvert', '!',
    `video/x-raw,format=NV12,framerate=${spec.framerate}/1`, '!',
  ]
}

function headlessSource(spec: PipelineSpec): string[] {
  return [
    'pipewiresrc', `path=${spec.sourceHandle}`, 'do-timestamp=true', 'keepalive-time=1000', '!',
    'queue', 'max-size-buffers=3', 'leaky=downstream', '!',
    'videoconvert', '!',
    'videorate', '!',
    `video/x-raw,format=NV12,framerate=${spec.framerate}/1`, '!',
  ]
}

function testSource(spec: PipelineSpec): string[] {
  const { width, height } = TEST_PATTERN_SIZE
  return [
    'videotestsrc', `pattern=${spec.sourceHandle}`, 'is-live=true', '!',
    `video/x-raw,width=${width},height=${height},framerate=${spec.framerate}/1`, '!',
    'videoconvert', '!',
    'video/x-raw,format=NV12', '!',
  ]
}

function x11Args(spec: PipelineSpec): string[] {
  const kbps = spec.bitrateKbps
  return [
    '-loglevel', 'warning', '-stats',
    '-f', 'x11grab', '-framerate', String(spec.framerate), '-i', spec.sourceHandle,
    '-c:v', 'libx264', '-preset', 'ultrafast', '-tune', 'zerolatency',
    '-b:v', `${kbps}k`, '-maxrate', `${kbps}k`, '-bufsize', `${kbps * 2}k`,
    '-g', '60', '-bf', '0', '-profile:v', 'baseline',
    '-f', 'mpegts', `tcp://${spec.receiver.host}:${spec.receiver.port}`,
  ]
}

/**
 * Serialize a pipeline spec into the ordered argument list of the external
 * pipeline binary. Element order matters to gst-launch.
 */
export function buildPipelineCommand(spec: PipelineSpec): PipelineCommand {
  switch (spec.backend) {
    case 'portal':
      return {
        command: GST_LAUNCH,
        args: ['-e', ...portalSource(spec), ...encodeAndSend(spec)],
        inheritedFds: spec.transportDescriptor === undefined ? [] : [spec.transportDescriptor],
      }
    case 'headless':
      return { command: GST_LAUNCH, args: ['-e', ...headlessSource(spec), ...encodeAndSend(spec)], inheritedFds: [] }
    case 'test':
      return { command: GST_LAUNCH, args: ['-e', ...testSource(spec), ...encodeAndSend(spec)], inheritedFds: [] }
    case 'x11':
      return { command: FFMPEG, args: x11Args(spec), inheritedFds: [] }
  }
}
