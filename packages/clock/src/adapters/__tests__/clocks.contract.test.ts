import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { FakeClock } from "../fake-clock"
import { SystemClock } from "../system-clock"

describeClockContract({ name: "FakeClock", make: () => new FakeClock(1_700_000_000_000) })
describeClockContract({ name: "SystemClock", make: () => new SystemClock() })
