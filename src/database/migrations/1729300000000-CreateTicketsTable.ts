import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateTicketsTable1729300000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'tickets',
        columns: [
          { name: 'ticket_id', type: 'uuid', isPrimary: true },
          { name: 'full_name', type: 'varchar', isNullable: false },
          { name: 'national_id', type: 'varchar', length: '14', isNullable: false },
          { name: 'email', type: 'varchar', isNullable: false },
          { name: 'phone', type: 'varchar', isNullable: false },
          { name: 'address', type: 'jsonb', isNullable: false },
          { name: 'device', type: 'jsonb', isNullable: false },
          { name: 'notes', type: 'text', default: "''" },
          { name: 'status', type: 'varchar', length: '16', isNullable: false },
          { name: 'rejection_reason', type: 'varchar', isNullable: true },
          { name: 'opened_at', type: 'timestamptz', isNullable: false },
          { name: 'processed_at', type: 'timestamptz', isNullable: false },
          { name: 'notified_at', type: 'timestamptz', isNullable: true },
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
        ],
        checks: [{ name: 'CHK_tickets_status', expression: "status IN ('accepted', 'rejected')" }],
      }),
      true,
    );

    await queryRunner.createIndex(
      'tickets',
      new TableIndex({ name: 'IDX_tickets_pending_notification', columnNames: ['processed_at'], where: 'notified_at IS NULL' }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropIndex('tickets', 'IDX_tickets_pending_notification');
    await queryRunner.dropTable('tickets');
  }
}
