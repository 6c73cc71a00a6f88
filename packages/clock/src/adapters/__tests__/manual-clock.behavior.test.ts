import { ManualClock } from "../manual-clock"

describe("ManualClock behavior", () => {
  it("starts at the given instant", () => {
    const clock = new ManualClock(new Date("2024-01-15T10:30:00.000Z"))

    expect(clock.now()).toEqual(new Date("2024-01-15T10:30:00.000Z"))
  })

  it("moves only on advance() and set()", () => {
    const clock = new ManualClock(1_000)

    expect(clock.nowMs()).toBe(1_000)

    clock.advance(500)
    expect(clock.nowMs()).toBe(1_500)
    expect(clock.now()).toEqual(new Date(1_500))

    clock.set(10)
    expect(clock.nowMs()).toBe(10)
  })
})
