import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateStoredFiles1731929340000 implements MigrationInterface {
  name = 'CreateStoredFiles1731929340000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TABLE \`stored_files\` (
        \`id\` bigint NOT NULL AUTO_INCREMENT,
        \`name\` varchar(255) NOT NULL,
        \`content\` longblob NOT NULL,
        \`content_type\` varchar(100) NOT NULL,
        \`file_size\` int NOT NULL,
        \`content_hash\` char(64) NOT NULL,
        \`created_at\` datetime(6) NOT NULL DEFAULT CURRENT_TIMESTAMP(6),
        PRIMARY KEY (\`id\`)
      ) ENGINE=InnoDB`,
    );
    await queryRunner.query(
      'CREATE INDEX `IDX_stored_files_created_at` ON `stored_files` (`created_at`)',
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      'DROP INDEX `IDX_stored_files_created_at` ON `stored_files`',
    );
    await queryRunner.query('DROP TABLE `stored_files`');
  }
}
