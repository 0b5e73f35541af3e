export { StoredFile, MAX_NAME_LENGTH } from './stored-file.entity';
