import { IUser, User } from '../../models';
import { NewUser, UserRecord, UserRepository } from '../types';

const toRecord = (doc: IUser): UserRecord => ({
  id: doc._id,
  username: doc.username,
  email: doc.email,
  firstName: doc.firstName,
  lastName: doc.lastName,
  isActive: doc.isActive,
  dateJoined: doc.dateJoined,
});

export class MongoUserRepository implements UserRepository {
  async create(input: NewUser): Promise<UserRecord> {
    const doc = await User.create({
      username: input.username,
      email: input.email,
      firstName: input.firstName ?? '',
      lastName: input.lastName ?? '',
    });
    return toRecord(doc);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const doc = await User.findById(id);
    return doc ? toRecord(doc) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ username });
    return doc ? toRecord(doc) : null;
  }
}
