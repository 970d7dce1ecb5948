import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { User } from '../../users/entities/user.entity';

/**
 * Directional: A having B as a contact says nothing about B's contacts.
 */
@Entity({ name: 'contacts' })
@Index('uq_contacts_owner_contact_user', ['ownerId', 'contactUserId'], {
  unique: true,
})
export class Contact {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'owner_id', type: 'uuid' })
  ownerId!: string;

  @Index()
  @Column({ name: 'contact_user_id', type: 'uuid' })
  contactUserId!: string;

  @Column({ name: 'display_name', type: 'varchar', length: 100, nullable: true })
  displayName!: string | null;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'owner_id' })
  owner?: User;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'contact_user_id' })
  contactUser?: User;
}
