import { describe, it, expect } from 'vitest'
import { buildPipelineCommand } from './args.js'
import type { PipelineSpec } from '../types/index.js'

const receiver = { host: '10.0.0.5', port: 9000 }

const ENCODE_AND_SEND = [
  'v4l2h264enc', 'extra-controls=controls,video_bitrate=4000000;', '!',
  'video/x-h264,profile=baseline,stream-format=byte-stream', '!',
  'mpegtsmux', '!',
  'tcpclientsink', 'host=10.0.0.5', 'port=9000',
]

function spec(overrides: Partial<PipelineSpec> & Pick<PipelineSpec, 'backend' | 'sourceHandle'>): PipelineSpec {
  return { receiver, framerate: 30, bitrateKbps: 4000, ...overrides }
}

describe('buildPipelineCommand', () => {
  it('should build a synthetic source pipeline for the test backend', () => {
    const command = buildPipelineCommand(spec({ backend: 'test', sourceHandle: 'ball' }))

    expect(command.command).toBe('gst-launch-1.0')
    expect(command.inheritedFds).toEqual([])
    expect(command.args).toEqual([
      '-e',
      'videotestsrc', 'pattern=ball', 'is-live=true', '!',
      'video/x-raw,width=1280,height=720,framerate=30/1', '!',
      'videoconvert', '!',
      'video/x-raw,format=NV12', '!',
      ...ENCODE_AND_SEND,
    ])
  })

  it('should read the portal stream through the inherited descriptor', () => {
    const command = buildPipelineCommand(spec({ backend: 'portal', sourceHandle: '42', transportDescriptor: 17 }))

    expect(command.inheritedFds).toEqual([17])
    expect(command.args).toEqual([
      '-e',
      'pipewiresrc', 'fd=3', 'path=42', 'do-timestamp=true', 'keepalive-time=1000', '!',
      'videoconvert', '!',
      'video/x-raw,format=NV12,framerate=30/1', '!',
      ...ENCODE_AND_SEND,
    ])
  })

  it('should refuse a portal pipeline without a descriptor', () => {
    expect(() => buildPipelineCommand(spec({ backend: 'portal', sourceHandle: '42' }))).toThrow(
      'Portal pipeline needs the PipeWire remote descriptor'
    )
  })

  it('should read the compositor node directly for the headless backend', () => {
    const command = buildPipelineCommand(spec({ backend: 'headless', sourceHandle: '57', framerate: 60 }))

    expect(command.inheritedFds).toEqual([])
    expect(command.args).toEqual([
      '-e',
      'pipewiresrc', 'path=57', 'do-timestamp=true', 'keepalive-time=1000', '!',
      'queue', 'max-size-buffers=3', 'leaky=downstream', '!',
      'videoconvert', '!',
      'videorate', '!',
      'video/x-raw,format=NV12,framerate=60/1', '!',
      ...ENCODE_AND_SEND,
    ])
  })

  it('should grab the X display with ffmpeg for the x11 backend', () => {
    const command = buildPipelineCommand(spec({ backend: 'x11', sourceHandle: ':1', bitrateKbps: 2500 }))

    expect(command.command).toBe('ffmpeg')
    expect(command.args).toEqual([
      '-loglevel', 'warning', '-stats',
      '-f', 'x11grab', '-framerate', '30', '-i', ':1',
      '-c:v', 'libx264', '-preset', 'ultrafast', '-tune', 'zerolatency',
      '-b:v', '2500k', '-maxrate', '2500k', '-bufsize', '5000k',
      '-g', '60', '-bf', '0', '-profile:v', 'baseline',
      '-f', 'mpegts', 'tcp://10.0.0.5:9000',
    ])
  })
})
