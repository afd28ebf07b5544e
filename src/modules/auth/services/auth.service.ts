import { ConflictException, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcryptjs';
import { UserEntity } from '../entities/user.entity';
import { JwtPayload } from '../strategies/jwt.strategy';
import { isUniqueViolation } from '../../../db/unique-violation';

export interface AuthTokens {
  accessToken: string;
  expiresIn: string;
}

@Injectable()
export class AuthService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  async validateUser(username: string, password: string): Promise<UserEntity | null> {
    const user = await this.userRepository
      .createQueryBuilder('user')
      .addSelect('user.password')
      .where('user.username = :username', { username })
      .getOne();

    if (!user || !user.password || !user.isActive) {
      return null;
    }

    if (!(await bcrypt.compare(password, user.password))) {
      return null;
    }

    delete user.password;
    return user;
  }

  login(user: UserEntity): { user: UserEntity; tokens: AuthTokens } {
    const payload: JwtPayload = {
      sub: user.id,
      username: user.username,
      admin: user.admin,
    };

    return {
      user,
      tokens: {
        accessToken: this.jwtService.sign(payload),
        expiresIn: this.configService.get<string>('JWT_EXPIRES_IN') ?? '1h',
      },
    };
  }

  async register(username: string, email: string, password: string): Promise<UserEntity> {
    const existing = await this.userRepository.findOne({
      where: [{ username }, { email }],
    });

    if (existing) {
      throw new ConflictException('Username or email already taken');
    }

    const hashedPassword = await bcrypt.hash(password, 10);
    const user = this.userRepository.create({
      username,
      email,
      password: hashedPassword,
    });
    // The unique indices settle a race between two registrations
    try {
      await this.userRepository.insert(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException('Username or email already taken');
      }
      throw error;
    }

    delete user.password;
    return user;
  }
}
