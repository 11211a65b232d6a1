import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

@Entity('document_types')
export class DocumentType {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ length: 50 })
  code!: string;

  @Column({ length: 200 })
  title!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  // Percent of the document's score taken from the supervisor mark (0-100).
  @Column({ type: 'int', default: 20 })
  supervisorWeight!: number;

  // Percent taken from the committee average (0-100).
  @Column({ type: 'int', default: 80 })
  committeeWeight!: number;

  @Column({ type: 'int', default: 0 })
  displayOrder!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
