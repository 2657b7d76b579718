import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

/**
 * users / content_items 초기 스키마
 * QueryRunner Table API 로 작성해 mysql, better-sqlite3 양쪽에서 동작
 */
export class InitialSchema1760745600000 implements MigrationInterface {
  name = 'InitialSchema1760745600000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'users',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'name', type: 'varchar', length: '64', isUnique: true },
          { name: 'password_hash', type: 'varchar', length: '255' },
          { name: 'created_at', type: 'datetime', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'content_items',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          { name: 'channel', type: 'varchar', length: '16' },
          { name: 'sender_id', type: 'integer' },
          { name: 'recipient_id', type: 'integer', isNullable: true },
          { name: 'stored_filename', type: 'varchar', length: '255', isUnique: true },
          { name: 'original_filename', type: 'varchar', length: '255' },
          { name: 'mime_type', type: 'varchar', length: '127' },
          { name: 'size', type: 'integer' },
          { name: 'created_at', type: 'datetime', default: 'CURRENT_TIMESTAMP' },
        ],
        indices: [
          new TableIndex({ name: 'IDX_content_items_channel', columnNames: ['channel'] }),
          new TableIndex({ name: 'IDX_content_items_sender', columnNames: ['sender_id'] }),
          new TableIndex({ name: 'IDX_content_items_recipient', columnNames: ['recipient_id'] }),
        ],
        foreignKeys: [
          new TableForeignKey({
            columnNames: ['sender_id'],
            referencedTableName: 'users',
            referencedColumnNames: ['id'],
          }),
          new TableForeignKey({
            columnNames: ['recipient_id'],
            referencedTableName: 'users',
            referencedColumnNames: ['id'],
          }),
        ],
      }),
      true,
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('content_items', true);
    await queryRunner.dropTable('users', true);
  }
}
