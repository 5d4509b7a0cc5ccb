/**
 * @hebrew מצב הבקרה של רמקול מדומה אחד.
 * lastMediaUri נכתב ב-SetAVTransportURI ונקרא ב-Play; בקשות בקרה לאותו רמקול רצות אחת אחרי השנייה.
 */
export class EmulatedSpeaker {
  public lastMediaUri = '';
  private queue: Promise<void> = Promise.resolve();

  /**
   * @param port - 0 = פורט אקראי; מתעדכן לפורט בפועל אחרי שהשרת מאזין.
   */
  constructor(
    public readonly name: string,
    public port: number,
  ) {}

  /** "Living Room" -> "LivingRoom", עבור ה-USN */
  public get compactName(): string {
    return this.name.split(' ').join('');
  }

  /**
   * @hebrew מריץ את fn כשאף בקשת בקרה אחרת של הרמקול לא רצה (תור FIFO).
   * כשל של fn לא עוצר את התור.
   */
  public runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

/**
 * @hebrew מפרק רשימת שמות מופרדת בפסיקים. שמות ריקים מדולגים; הפורטים רצים ברצף מ-basePort.
 */
export function createSpeakers(namesList: string, basePort: number): EmulatedSpeaker[] {
  const names = namesList.split(',').map(name => name.trim()).filter(name => name !== '');
  return names.map((name, index) => new EmulatedSpeaker(name, basePort === 0 ? 0 : basePort + index));
}
