import { CreateStoredFiles1731929340000 } from './1731929340000-CreateStoredFiles';

export const migrations = [CreateStoredFiles1731929340000];
