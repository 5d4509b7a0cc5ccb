// ייבוא לצורך תופעת הלוואי: טעינת קבצי ה-.env לפני שהלוגרים של המודולים נוצרים.
// יש לייבא ראשון בנקודת הכניסה של תהליך.
import { loadEnvFiles } from './envLoader';

loadEnvFiles();
