export { DedupCache } from './dedup.js'
export type { DedupOptions } from './dedup.js'
export { KeyedSerialQueue } from './serial-queue.js'
export { parseDate, parseTime, withSeconds, todayIso, DATE_FORMAT, TIME_FORMAT } from './datetime.js'
