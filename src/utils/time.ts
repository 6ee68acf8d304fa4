// All stamps are UTC.

function parts(d: Date) {
  const iso = d.toISOString(); // 2026-10-19T08:05:09.123Z
  return {
    y: iso.slice(0, 4),
    mo: iso.slice(5, 7),
    d: iso.slice(8, 10),
    h: iso.slice(11, 13),
    mi: iso.slice(14, 16),
    s: iso.slice(17, 19),
  };
}

/** 2026-10-19 08:05:09 UTC */
export function formatUtc(d: Date): string {
  const p = parts(d);
  return `${p.y}-${p.mo}-${p.d} ${p.h}:${p.mi}:${p.s} UTC`;
}

/** 20261019-080509, used in report file names */
export function fileStamp(d: Date): string {
  const p = parts(d);
  return `${p.y}${p.mo}${p.d}-${p.h}${p.mi}${p.s}`;
}

/** 2026-10-19-080509, used in snapshot descriptions */
export function descriptionStamp(d: Date): string {
  const p = parts(d);
  return `${p.y}-${p.mo}-${p.d}-${p.h}${p.mi}${p.s}`;
}
