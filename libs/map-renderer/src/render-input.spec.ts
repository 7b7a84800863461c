import { mergeStreams, normalizeStream, summarizeTrack, type RawRow, type Track } from '@trackfuse/track'
import { buildTrackRenderInput } from './render-input'

const trackOf = (rows: RawRow[]): Track => mergeStreams([normalizeStream({ sourceKind: 'fit-record-definition', rows })])

describe('buildTrackRenderInput', () => {
  const track = trackOf([
    { timestamp: new Date('2024-05-01T08:00:00Z'), position_lat: 47.0, position_long: 8.0, altitude: 400, speed: 4 },
    { timestamp: new Date('2024-05-01T08:00:10Z'), position_lat: 47.1, position_long: 8.1, altitude: 415, speed: 6 },
    { timestamp: new Date('2024-05-01T08:00:20Z'), position_lat: 47.2, position_long: 8.2, altitude: 430, speed: 6 },
  ])

  it('places start, finish and extremum markers', () => {
    const input = buildTrackRenderInput(track, { name: 'Ride', extremumField: 'speed' })

    expect(input.markers).toEqual([
      { kind: 'start', lat: 47.0, lon: 8.0 },
      { kind: 'finish', lat: 47.2, lon: 8.2 },
      { kind: 'extremum', lat: 47.1, lon: 8.1, label: 'max speed 6' },
    ])
    expect(input.gradient).toBeUndefined()
    expect(input.distance).toBe(summarizeTrack(track).distance)
    expect(input.polyline).toEqual({ lat: [47.0, 47.1, 47.2], lon: [8.0, 8.1, 8.2] })
  })

  it('colours by the observed range unless one is supplied', () => {
    expect(buildTrackRenderInput(track, { name: 'Ride', field: 'ele' }).gradient?.range).toEqual({ min: 400, max: 430 })
    expect(
      buildTrackRenderInput(track, { name: 'Ride', field: 'ele', range: { min: 0, max: 1000 } }).gradient,
    ).toEqual({
      field: 'ele',
      points: [
        [47.0, 8.0, 400],
        [47.1, 8.1, 415],
        [47.2, 8.2, 430],
      ],
      range: { min: 0, max: 1000 },
    })
  })

  it('skips the gradient when the field has no readings', () => {
    expect(buildTrackRenderInput(track, { name: 'Ride', field: 'heart_rate' }).gradient).toBeUndefined()
  })

  it('has no markers for an empty track', () => {
    const input = buildTrackRenderInput(mergeStreams([]), { name: 'Empty', extremumField: 'speed' })
    expect(input.markers).toEqual([])
    expect(input.polyline).toEqual({ lat: [], lon: [] })
  })
})
