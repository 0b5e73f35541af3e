import { QueryRunner } from 'typeorm';
import { CreateStoredFiles1731929340000 } from './1731929340000-CreateStoredFiles';

function createQueryRunner() {
  const query = jest.fn().mockResolvedValue(undefined);
  // up/down은 query()만 사용한다
  const runner = { query } as unknown as QueryRunner;
  return { runner, query };
}

describe('CreateStoredFiles migration', () => {
  it('up은 테이블과 created_at 인덱스를 만든다', async () => {
    const { runner, query } = createQueryRunner();

    await new CreateStoredFiles1731929340000().up(runner);

    expect(query).toHaveBeenCalledTimes(2);
    expect(query.mock.calls[0][0]).toContain('CREATE TABLE `stored_files`');
    expect(query.mock.calls[0][0]).toContain('`content` longblob NOT NULL');
    expect(query.mock.calls[1][0]).toBe(
      'CREATE INDEX `IDX_stored_files_created_at` ON `stored_files` (`created_at`)',
    );
  });

  it('down은 역순으로 제거한다', async () => {
    const { runner, query } = createQueryRunner();

    await new CreateStoredFiles1731929340000().down(runner);

    expect(query.mock.calls.map((call) => call[0])).toEqual([
      'DROP INDEX `IDX_stored_files_created_at` ON `stored_files`',
      'DROP TABLE `stored_files`',
    ]);
  });
});
