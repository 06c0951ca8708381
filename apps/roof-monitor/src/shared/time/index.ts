const pad = (value: number, width = 2): string =>
  String(value).padStart(width, "0");

/**
 * Local time as `YYYY-MM-DD hh:mm:ssAM`. Downstream status parsers depend on
 * this exact layout: 12-hour clock, no space before the meridiem.
 */
export const formatStatusTimestamp = (date: Date): string => {
  const hours24 = date.getHours();
  const meridiem = hours24 < 12 ? "AM" : "PM";
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;

  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(hours12)}:${pad(date.getMinutes())}:${pad(date.getSeconds())}${meridiem}`
  );
};
