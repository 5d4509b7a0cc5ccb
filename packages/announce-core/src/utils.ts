/**
 * @hebrew פונקציית עזר להמתנה (sleep). ההמתנה אינה ניתנת לביטול.
 * @param ms - זמן המתנה במילישניות.
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
